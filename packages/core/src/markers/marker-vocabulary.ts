/**
 * STS marker vocabulary of the EAA/EMQN 2023 two-step analysis.
 *
 * The order of `MARKER_DEFINITIONS` is the display and reporting order used
 * everywhere a list of markers is produced.
 */

export const MARKER_GROUPS = ['control', 'basic', 'extension'] as const;
export type MarkerGroup = (typeof MARKER_GROUPS)[number];

export const AZF_REGIONS = ['AZFa', 'AZFb', 'AZFc'] as const;
export type AzfRegion = (typeof AZF_REGIONS)[number];

/** Region a marker probes; `gr/gr` markers sit inside AZFc but are reported separately. */
export type MarkerRegion = AzfRegion | 'gr/gr' | 'control';

export interface MarkerDefinition {
  name: string;
  group: MarkerGroup;
  region: MarkerRegion;
  synonyms: readonly string[];
  description: string;
}

export const MARKER_DEFINITIONS = [
  { name: 'sY14', group: 'control', region: 'control', synonyms: ['SRY'], description: 'SRY, Yp control' },
  {
    name: 'ZFX/ZFY',
    group: 'control',
    region: 'control',
    synonyms: ['ZFX/Y', 'ZFXY'],
    description: 'X/Y internal amplification control',
  },
  { name: 'sY84', group: 'basic', region: 'AZFa', synonyms: [], description: 'AZFa basic' },
  { name: 'sY86', group: 'basic', region: 'AZFa', synonyms: [], description: 'AZFa basic' },
  { name: 'sY127', group: 'basic', region: 'AZFb', synonyms: [], description: 'AZFb basic' },
  { name: 'sY134', group: 'basic', region: 'AZFb', synonyms: [], description: 'AZFb basic' },
  { name: 'sY254', group: 'basic', region: 'AZFc', synonyms: [], description: 'AZFc basic (DAZ)' },
  { name: 'sY255', group: 'basic', region: 'AZFc', synonyms: [], description: 'AZFc basic (DAZ)' },
  { name: 'sY82', group: 'extension', region: 'AZFa', synonyms: [], description: 'AZFa proximal flank, retained' },
  { name: 'sY1064', group: 'extension', region: 'AZFa', synonyms: [], description: 'AZFa proximal, deleted' },
  { name: 'sY1065', group: 'extension', region: 'AZFa', synonyms: [], description: 'AZFa distal, deleted' },
  { name: 'sY1182', group: 'extension', region: 'AZFa', synonyms: [], description: 'AZFa distal, deleted' },
  { name: 'sY88', group: 'extension', region: 'AZFa', synonyms: [], description: 'AZFa distal flank, retained' },
  { name: 'sY105', group: 'extension', region: 'AZFb', synonyms: [], description: 'AZFb proximal flank, retained' },
  { name: 'sY121', group: 'extension', region: 'AZFb', synonyms: [], description: 'AZFb proximal, deleted' },
  { name: 'sY1224', group: 'extension', region: 'AZFb', synonyms: [], description: 'AZFb proximal, variable' },
  { name: 'sY1192', group: 'extension', region: 'AZFb', synonyms: [], description: 'AZFb distal, TESE prognosis' },
  { name: 'sY153', group: 'extension', region: 'AZFb', synonyms: [], description: 'AZFb distal flank, retained' },
  { name: 'sY160', group: 'extension', region: 'AZFc', synonyms: [], description: 'Yq heterochromatin, terminal' },
  { name: 'sY1291', group: 'extension', region: 'gr/gr', synonyms: [], description: 'gr/gr, deleted' },
  { name: 'sY1191', group: 'extension', region: 'gr/gr', synonyms: [], description: 'gr/gr, retained' },
] as const satisfies readonly MarkerDefinition[];

export type MarkerName = (typeof MARKER_DEFINITIONS)[number]['name'];

export const ALL_MARKERS: readonly MarkerName[] = MARKER_DEFINITIONS.map((definition) => definition.name);

export const CONTROL_MARKERS: readonly MarkerName[] = ['sY14', 'ZFX/ZFY'];

export const BASIC_MARKERS = {
  AZFa: ['sY84', 'sY86'],
  AZFb: ['sY127', 'sY134'],
  AZFc: ['sY254', 'sY255'],
} as const satisfies Record<AzfRegion, readonly MarkerName[]>;

export const ANALYSIS_DEPTHS = ['basic', 'extension'] as const;
export type AnalysisDepth = (typeof ANALYSIS_DEPTHS)[number];

const LOOKUP = new Map<string, MarkerName>();
for (const definition of MARKER_DEFINITIONS) {
  LOOKUP.set(definition.name.toLowerCase(), definition.name);
  for (const synonym of definition.synonyms) {
    LOOKUP.set(synonym.toLowerCase(), definition.name);
  }
}

/**
 * Map a raw marker label to its canonical name, or `undefined` when the label
 * is not part of the vocabulary. Matching is exact after trimming and case
 * folding.
 */
export function normalizeMarkerName(raw: string): MarkerName | undefined {
  return LOOKUP.get(raw.trim().toLowerCase());
}

/**
 * Markers that must be tested for an analysis of the given depth.
 * `basic` covers the control and basic markers, `extension` adds every
 * extension marker.
 */
export function requiredMarkersFor(depth: AnalysisDepth): readonly MarkerName[] {
  const basic = MARKER_DEFINITIONS.filter((definition) => definition.group !== 'extension').map(
    (definition) => definition.name
  );
  return depth === 'basic' ? basic : ALL_MARKERS;
}

/** Sort marker names into vocabulary order. */
export function sortMarkers(names: Iterable<MarkerName>): MarkerName[] {
  return [...names].sort((a, b) => ALL_MARKERS.indexOf(a) - ALL_MARKERS.indexOf(b));
}
