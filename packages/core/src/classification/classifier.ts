import { err, ok, type Result } from 'neverthrow';

import { MissingRequiredMarkerError } from '../errors/index.js';
import type { MarkerPanel } from '../markers/marker-panel.js';
import { BASIC_MARKERS, CONTROL_MARKERS, requiredMarkersFor, type MarkerName } from '../markers/marker-vocabulary.js';
import type { MarkerStatus } from '../schemas/marker-schemas.js';

import type {
  ClassificationLabel,
  ClassificationResult,
  DiagnosticNote,
  RegionDeletions,
  TesePrognosis,
} from './classification-types.js';
import { EAA_EMQN_2023, type GuidelineProfile } from './guideline-profiles.js';

export interface ClassifyOptions {
  guideline?: GuidelineProfile | undefined;
}

type MarkerPattern = readonly (readonly [MarkerName, MarkerStatus])[];

interface PatternCheck {
  untested: MarkerName[];
  deviating: MarkerName[];
}

/** Markers a normal Y retains; an absent call outside a classified deletion is suspicious. */
const EXPECTED_PRESENT: readonly MarkerName[] = ['sY82', 'sY88', 'sY105', 'sY153', 'sY160', 'sY1191'];

const AZFA_BOUNDARY: MarkerPattern = [
  ['sY82', 'present'],
  ['sY1064', 'absent'],
  ['sY88', 'present'],
];

const AZFB_P5_PROXIMAL_P1_BOUNDARY: MarkerPattern = [
  ['sY105', 'present'],
  ['sY121', 'absent'],
  ['sY153', 'present'],
];

function checkPattern(panel: MarkerPanel, pattern: MarkerPattern): PatternCheck {
  const check: PatternCheck = { untested: [], deviating: [] };
  for (const [name, expected] of pattern) {
    const call = panel.statusOf(name);
    if (call === 'not_tested') check.untested.push(name);
    else if (call !== expected) check.deviating.push(name);
  }
  return check;
}

function regionDeleted(panel: MarkerPanel, markers: readonly MarkerName[]): boolean {
  return markers.every((name) => panel.isAbsent(name));
}

function hasGrGrPattern(panel: MarkerPanel): boolean {
  return panel.isAbsent('sY1291') && panel.isPresent('sY1191');
}

function describeCalls(panel: MarkerPanel, names: readonly MarkerName[]): string {
  return names.map((name) => `${name} ${panel.statusOf(name)}`).join(', ');
}

function boundaryNotes(region: string, check: PatternCheck, panel: MarkerPanel): DiagnosticNote[] {
  const notes: DiagnosticNote[] = [];
  if (check.deviating.length > 0) {
    notes.push({
      code: 'atypical-boundary',
      message: `${region} breakpoint pattern is atypical (${describeCalls(panel, check.deviating)}); confirm the deletion extent`,
      markers: check.deviating,
    });
  }
  if (check.untested.length > 0) {
    notes.push({
      code: 'missing-extension-marker',
      message: `${region} extension markers not tested: ${check.untested.join(', ')}; breakpoints unconfirmed`,
      markers: check.untested,
    });
  }
  return notes;
}

/**
 * AZFa breakpoints: sY82 and sY88 retained, sY1064 deleted, and at least one
 * of sY1065/sY1182 deleted.
 */
function azfaBoundaryCheck(panel: MarkerPanel): PatternCheck {
  const check = checkPattern(panel, AZFA_BOUNDARY);
  const distal: MarkerName[] = ['sY1065', 'sY1182'];
  const tested = distal.filter((name) => panel.has(name));

  if (tested.length === 0) {
    check.untested.push(...distal);
  } else if (tested.every((name) => panel.isPresent(name))) {
    check.deviating.push(...tested);
  }
  return check;
}

function coexistingGrGrNotes(panel: MarkerPanel): DiagnosticNote[] {
  if (!hasGrGrPattern(panel)) return [];
  return [
    {
      code: 'coexisting-pattern',
      message: 'gr/gr pattern (sY1291 absent, sY1191 present) also detected',
      markers: ['sY1291', 'sY1191'],
    },
  ];
}

function unexpectedAbsenceNotes(panel: MarkerPanel): DiagnosticNote[] {
  const absent = EXPECTED_PRESENT.filter((name) => panel.isAbsent(name));
  if (absent.length === 0) return [];
  return [
    {
      code: 'unexpected-absence',
      message: `Markers expected present are absent: ${absent.join(', ')}; review for an atypical deletion or assay failure`,
      markers: absent,
    },
  ];
}

function freezeResult(result: ClassificationResult): ClassificationResult {
  for (const note of result.notes) {
    Object.freeze(note.markers);
    Object.freeze(note);
  }
  Object.freeze(result.notes);
  Object.freeze(result.regions);
  return Object.freeze(result);
}

/**
 * Classify a marker panel with the EAA/EMQN decision tree.
 *
 * Rules are evaluated top-down and the first match wins:
 * control → sY254/sY255 consistency → basic-marker gate → AZFabc → AZFbc → AZFa → AZFb → AZFc
 * → gr/gr → no deletion.
 *
 * Fails only when control or basic markers were not tested. Untested
 * extension markers lower the label's resolution and are reported as notes.
 */
export function classify(
  panel: MarkerPanel,
  options: ClassifyOptions = {}
): Result<ClassificationResult, MissingRequiredMarkerError> {
  const guideline = options.guideline ?? EAA_EMQN_2023;
  const panelNotes: DiagnosticNote[] = panel.notes.map((note) => ({
    code: 'duplicate-marker',
    message: note.message,
    markers: [note.marker],
  }));

  const result = (
    label: ClassificationLabel,
    prognosis: TesePrognosis | undefined,
    regions: RegionDeletions | undefined,
    notes: DiagnosticNote[] = []
  ): Result<ClassificationResult, MissingRequiredMarkerError> =>
    ok(freezeResult({ label, prognosis, notes: [...panelNotes, ...notes], regions, guideline: guideline.id }));

  const missingRequired = panel.validateCompleteness(requiredMarkersFor('basic'));
  if (missingRequired.some((name) => CONTROL_MARKERS.includes(name))) {
    return err(new MissingRequiredMarkerError(missingRequired));
  }

  if (panel.isAbsent('sY14') && panel.isPresent('ZFX/ZFY')) {
    return result('46,XX_MALE_OR_COMPLETE_Y_CHROMOSOME_ABSENCE', 'not_applicable', undefined, [
      {
        code: 'karyotype-recommended',
        message: 'sY14 (SRY) absent with ZFX/ZFY present: confirm 46,XX male or Y absence by karyotype analysis',
        markers: ['sY14', 'ZFX/ZFY'],
      },
    ]);
  }

  if (panel.isAbsent('ZFX/ZFY')) {
    return result('METHODOLOGICAL_ERROR', undefined, undefined, [
      {
        code: 'methodological-discordance',
        message: 'ZFX/ZFY internal control absent: amplification failure or unsuitable sample; repeat the assay',
        markers: ['ZFX/ZFY'],
      },
    ]);
  }

  const sY254 = panel.statusOf('sY254');
  const sY255 = panel.statusOf('sY255');
  if (sY254 !== 'not_tested' && sY255 !== 'not_tested' && sY254 !== sY255) {
    return result('METHODOLOGICAL_ERROR', undefined, undefined, [
      {
        code: 'methodological-discordance',
        message: `sY254 and sY255 are discordant (${describeCalls(panel, ['sY254', 'sY255'])}); a true AZFc deletion removes both, repeat the assay`,
        markers: ['sY254', 'sY255'],
      },
    ]);
  }

  if (missingRequired.length > 0) {
    return err(new MissingRequiredMarkerError(missingRequired));
  }

  const regions: RegionDeletions = {
    AZFa: regionDeleted(panel, BASIC_MARKERS.AZFa),
    AZFb: regionDeleted(panel, BASIC_MARKERS.AZFb),
    AZFc: regionDeleted(panel, BASIC_MARKERS.AZFc),
  };

  if (regions.AZFa && regions.AZFb && regions.AZFc) {
    return result('COMPLETE_AZFABC_DELETION', 'not_possible', regions, [
      {
        code: 'associated-abnormalities',
        message: 'Associated karyotype abnormalities common; karyotype analysis recommended',
      },
    ]);
  }

  if (regions.AZFb && regions.AZFc) {
    return classifyAzfbc(panel, guideline, regions, result);
  }

  if (regions.AZFa && !regions.AZFb && !regions.AZFc) {
    return result('COMPLETE_AZFA_DELETION', 'not_possible', regions, [
      ...boundaryNotes('AZFa', azfaBoundaryCheck(panel), panel),
      ...coexistingGrGrNotes(panel),
    ]);
  }

  if (regions.AZFb && !regions.AZFa && !regions.AZFc) {
    return classifyAzfb(panel, regions, result);
  }

  if (regions.AZFc && !regions.AZFa && !regions.AZFb) {
    return classifyAzfc(panel, regions, result);
  }

  if (!regions.AZFa && !regions.AZFb && !regions.AZFc) {
    if (hasGrGrPattern(panel)) {
      return result('PARTIAL_AZFC_GR/GR_DELETION', 'not_applicable', regions, [
        {
          code: 'population-risk-factor',
          message: 'Population-specific risk factor for impaired spermatogenesis; increased germ-cell-tumor risk',
          markers: ['sY1291', 'sY1191'],
        },
        ...unexpectedAbsenceNotes(panel),
      ]);
    }

    const untestedGrGr = panel.validateCompleteness(['sY1291', 'sY1191']);
    return result('NO_DELETION_DETECTED', undefined, regions, [
      ...unexpectedAbsenceNotes(panel),
      ...(untestedGrGr.length > 0
        ? [
            {
              code: 'missing-extension-marker' as const,
              message: `gr/gr markers not tested: ${untestedGrGr.join(', ')}; partial AZFc deletions cannot be excluded`,
              markers: untestedGrGr,
            },
          ]
        : []),
    ]);
  }

  // AZFa with exactly one of AZFb/AZFc: non-contiguous, no recombination product explains it
  const partner = regions.AZFb ? 'AZFb' : 'AZFc';
  const retained = regions.AZFb ? 'AZFc' : 'AZFb';
  return result('METHODOLOGICAL_ERROR', undefined, regions, [
    {
      code: 'methodological-discordance',
      message: `Non-contiguous deletion pattern (AZFa and ${partner} deleted, ${retained} retained); repeat the analysis`,
      markers: [...BASIC_MARKERS.AZFa, ...BASIC_MARKERS[partner]],
    },
  ]);
}

type ResultFactory = (
  label: ClassificationLabel,
  prognosis: TesePrognosis | undefined,
  regions: RegionDeletions | undefined,
  notes?: DiagnosticNote[]
) => Result<ClassificationResult, MissingRequiredMarkerError>;

function classifyAzfbc(
  panel: MarkerPanel,
  guideline: GuidelineProfile,
  regions: RegionDeletions,
  result: ResultFactory
): Result<ClassificationResult, MissingRequiredMarkerError> {
  const terminalNotes: DiagnosticNote[] = panel.isAbsent('sY160')
    ? [
        {
          code: 'karyotype-recommended',
          message: 'sY160 absent: deletion extends to the Yq terminal; karyotype analysis for 46,XY/45,X mosaicism',
          markers: ['sY160'],
        },
      ]
    : [];

  switch (guideline.azfbcBoundary(panel)) {
    case 'P5_DISTAL_P1':
      return result('COMPLETE_AZFBC_DELETION_P5/DISTAL_P1', 'virtually_impossible', regions, terminalNotes);
    case 'P4_DISTAL_P1':
      return result('COMPLETE_AZFBC_DELETION_P4/DISTAL_P1', 'may_be_positive', regions, terminalNotes);
    case 'undetermined': {
      const untested = panel.validateCompleteness(guideline.azfbcBoundaryMarkers);
      const boundaryNote: DiagnosticNote =
        untested.length > 0
          ? {
              code: 'extension-analysis-required',
              message: `Extension analysis required to determine the AZFbc subtype; not tested: ${untested.join(', ')}`,
              markers: untested,
            }
          : {
              code: 'atypical-boundary',
              message: `AZFbc proximal breakpoint matches neither P5 nor P4 (${describeCalls(panel, guideline.azfbcBoundaryMarkers)})`,
              markers: [...guideline.azfbcBoundaryMarkers],
            };
      return result('AZFBC_DELETION_SUBTYPE_UNDETERMINED', 'undetermined', regions, [boundaryNote, ...terminalNotes]);
    }
  }
}

function classifyAzfb(
  panel: MarkerPanel,
  regions: RegionDeletions,
  result: ResultFactory
): Result<ClassificationResult, MissingRequiredMarkerError> {
  const grGr = coexistingGrGrNotes(panel);

  switch (panel.statusOf('sY1192')) {
    case 'absent':
      return result('COMPLETE_AZFB_DELETION_P5/PROXIMAL_P1', 'virtually_impossible', regions, [
        ...boundaryNotes('AZFb', checkPattern(panel, AZFB_P5_PROXIMAL_P1_BOUNDARY), panel),
        ...grGr,
      ]);
    case 'present':
      return result('PARTIAL_AZFB_DELETION', 'possible', regions, grGr);
    case 'not_tested':
      return result('AZFB_DELETION_SUBTYPE_UNDETERMINED', 'undetermined', regions, [
        {
          code: 'extension-analysis-required',
          message: 'sY1192 not tested: mandatory for TESE prognosis per the 2023 guideline update',
          markers: ['sY1192'],
        },
        ...grGr,
      ]);
  }
}

function classifyAzfc(
  panel: MarkerPanel,
  regions: RegionDeletions,
  result: ResultFactory
): Result<ClassificationResult, MissingRequiredMarkerError> {
  switch (panel.statusOf('sY160')) {
    case 'present':
      return result('COMPLETE_AZFC_DELETION_B2/B4', 'approximately_50_percent', regions);
    case 'absent':
      return result('TERMINAL_AZFC_DELETION', 'undetermined', regions, [
        {
          code: 'karyotype-recommended',
          message: 'Requires karyotype analysis for 46,XY/45,X mosaicism',
          markers: ['sY160'],
        },
      ]);
    case 'not_tested':
      return result('AZFC_DELETION_SUBTYPE_UNDETERMINED', 'undetermined', regions, [
        {
          code: 'extension-analysis-required',
          message: 'sY160 not tested: required to distinguish a b2/b4 deletion from a terminal deletion',
          markers: ['sY160'],
        },
      ]);
  }
}
