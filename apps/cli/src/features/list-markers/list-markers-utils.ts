// Pure business logic for list-markers command

import {
  MARKER_DEFINITIONS,
  MARKER_GROUPS,
  type MarkerGroup,
  type MarkerName,
  type MarkerRegion,
} from '@ydel/core';

export interface MarkerInfo {
  name: MarkerName;
  group: MarkerGroup;
  region: MarkerRegion;
  synonyms: string[];
  description: string;
}

export interface MarkerListSummary {
  total: number;
  byGroup: Record<MarkerGroup, number>;
}

/**
 * Vocabulary entries in reporting order, optionally restricted to one group.
 */
export function buildMarkerList(group?: MarkerGroup): MarkerInfo[] {
  return MARKER_DEFINITIONS.filter((definition) => !group || definition.group === group).map((definition) => ({
    name: definition.name,
    group: definition.group,
    region: definition.region,
    synonyms: [...definition.synonyms],
    description: definition.description,
  }));
}

export function buildSummary(markers: MarkerInfo[]): MarkerListSummary {
  const byGroup: Record<MarkerGroup, number> = { control: 0, basic: 0, extension: 0 };
  for (const marker of markers) {
    byGroup[marker.group]++;
  }
  return { total: markers.length, byGroup };
}

function formatMarker(marker: MarkerInfo): string {
  const synonyms = marker.synonyms.length > 0 ? ` [synonyms: ${marker.synonyms.join(', ')}]` : '';
  return `  ${marker.name.padEnd(8)} ${marker.region.padEnd(8)} ${marker.description}${synonyms}`;
}

/**
 * Text listing grouped by marker group, followed by the totals.
 */
export function formatMarkerList(markers: MarkerInfo[], summary: MarkerListSummary): string[] {
  const lines: string[] = [];

  for (const group of MARKER_GROUPS) {
    const inGroup = markers.filter((marker) => marker.group === group);
    if (inGroup.length === 0) continue;
    lines.push(`${group.toUpperCase()} markers:`, ...inGroup.map(formatMarker), '');
  }

  lines.push(`Total markers: ${summary.total}`);
  return lines;
}
