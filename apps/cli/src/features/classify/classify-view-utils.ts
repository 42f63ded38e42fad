// Text rendering for classify results: one-line verdict, validation listing and the verbose report.

import {
  AZF_REGIONS,
  BASIC_MARKERS,
  CONTROL_MARKERS,
  MARKER_DEFINITIONS,
  PROGNOSIS_DESCRIPTIONS,
  recommendationsFor,
  requiredMarkersFor,
  type ClassificationResult,
  type GuidelineProfile,
  type MarkerName,
  type MarkerPanel,
  type MarkerRegion,
} from '@ydel/core';

import type { ValidationSummary } from './classify-utils.js';

const REPORT_TITLE = '=== Y-CHROMOSOMAL MICRODELETION ANALYSIS REPORT ===';
const REPORT_RULE = '='.repeat(50);

/**
 * Label, then ` (TESE: <prognosis>)` when one applies, then one indented line per note.
 */
export function formatClassificationLines(result: ClassificationResult): string[] {
  const head = result.prognosis ? `${result.label} (TESE: ${result.prognosis})` : result.label;
  return [head, ...result.notes.map((note) => `  - ${note.message}`)];
}

export function formatValidationLines(summary: ValidationSummary): string[] {
  if (summary.complete) {
    return [`All required markers are present (${summary.depth} analysis).`];
  }
  return [
    `Missing ${summary.missing.length} required markers (${summary.depth} analysis):`,
    ...summary.missing.map((marker) => `  - ${marker}`),
  ];
}

function markerLine(panel: MarkerPanel, marker: MarkerName, indent: string): string {
  return `${indent}${marker}: ${panel.statusOf(marker)}`;
}

function extensionMarkersByRegion(): Map<MarkerRegion, MarkerName[]> {
  const byRegion = new Map<MarkerRegion, MarkerName[]>();
  for (const definition of MARKER_DEFINITIONS) {
    if (definition.group !== 'extension') continue;
    const markers = byRegion.get(definition.region) ?? [];
    markers.push(definition.name);
    byRegion.set(definition.region, markers);
  }
  return byRegion;
}

function formatMarkerSummary(panel: MarkerPanel): string[] {
  const lines = ['MARKER SUMMARY:', 'Control markers:'];
  lines.push(...CONTROL_MARKERS.map((marker) => markerLine(panel, marker, '  ')));

  lines.push('', 'Basic AZF markers:');
  for (const region of AZF_REGIONS) {
    const markers: readonly MarkerName[] = BASIC_MARKERS[region];
    lines.push(`  ${region}:`, ...markers.map((marker) => markerLine(panel, marker, '    ')));
  }

  lines.push('', 'Extension markers:');
  for (const [region, markers] of extensionMarkersByRegion()) {
    lines.push(`  ${region}:`, ...markers.map((marker) => markerLine(panel, marker, '    ')));
  }

  return lines;
}

/**
 * Full report for `--verbose`.
 */
export function formatClassificationReport(
  panel: MarkerPanel,
  result: ClassificationResult,
  profile: GuidelineProfile
): string {
  const lines = [REPORT_TITLE, '', `CLASSIFICATION: ${result.label}`];

  if (result.prognosis) {
    lines.push(`TESE PROGNOSIS: ${PROGNOSIS_DESCRIPTIONS[result.prognosis]}`);
  }
  lines.push(`GUIDELINE: ${profile.title} (${profile.id})`);

  lines.push('', ...formatMarkerSummary(panel));

  if (result.notes.length > 0) {
    lines.push('', 'NOTES:', ...result.notes.map((note) => `- ${note.message}`));
  }

  lines.push('', 'CLINICAL RECOMMENDATIONS:', ...recommendationsFor(result.label).map((line) => `- ${line}`));

  const untested = panel.validateCompleteness(requiredMarkersFor('extension'));
  if (untested.length > 0) {
    lines.push(
      '',
      'WARNING: The following markers were not tested:',
      ...untested.map((marker) => `  - ${marker}`),
      'Complete testing is recommended for accurate diagnosis.'
    );
  }

  lines.push('', REPORT_RULE);
  return lines.join('\n');
}
