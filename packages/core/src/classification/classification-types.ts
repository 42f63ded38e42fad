import type { MarkerName } from '../markers/marker-vocabulary.js';

/**
 * Reportable labels. `AZFC_DELETION_SUBTYPE_UNDETERMINED` and
 * `AZFBC_DELETION_SUBTYPE_UNDETERMINED` extend the published EAA/EMQN
 * vocabulary: they mark deletions whose extension markers were not tested or
 * do not fit a recognised breakpoint.
 */
export const CLASSIFICATION_LABELS = [
  'NO_DELETION_DETECTED',
  '46,XX_MALE_OR_COMPLETE_Y_CHROMOSOME_ABSENCE',
  'METHODOLOGICAL_ERROR',
  'COMPLETE_AZFA_DELETION',
  'COMPLETE_AZFB_DELETION_P5/PROXIMAL_P1',
  'PARTIAL_AZFB_DELETION',
  'AZFB_DELETION_SUBTYPE_UNDETERMINED',
  'COMPLETE_AZFC_DELETION_B2/B4',
  'TERMINAL_AZFC_DELETION',
  'AZFC_DELETION_SUBTYPE_UNDETERMINED',
  'PARTIAL_AZFC_GR/GR_DELETION',
  'COMPLETE_AZFBC_DELETION_P5/DISTAL_P1',
  'COMPLETE_AZFBC_DELETION_P4/DISTAL_P1',
  'AZFBC_DELETION_SUBTYPE_UNDETERMINED',
  'COMPLETE_AZFABC_DELETION',
] as const;
export type ClassificationLabel = (typeof CLASSIFICATION_LABELS)[number];

export const TESE_PROGNOSES = [
  'not_possible',
  'virtually_impossible',
  'possible',
  'approximately_50_percent',
  'may_be_positive',
  'undetermined',
  'not_applicable',
] as const;
export type TesePrognosis = (typeof TESE_PROGNOSES)[number];

export type DiagnosticNoteCode =
  | 'missing-extension-marker'
  | 'extension-analysis-required'
  | 'karyotype-recommended'
  | 'methodological-discordance'
  | 'atypical-boundary'
  | 'duplicate-marker'
  | 'population-risk-factor'
  | 'unexpected-absence'
  | 'coexisting-pattern'
  | 'associated-abnormalities';

export interface DiagnosticNote {
  readonly code: DiagnosticNoteCode;
  readonly message: string;
  readonly markers?: readonly MarkerName[] | undefined;
}

/** Outcome of the basic analysis: both basic markers of the region absent. */
export interface RegionDeletions {
  readonly AZFa: boolean;
  readonly AZFb: boolean;
  readonly AZFc: boolean;
}

/**
 * Immutable output of one classification run.
 *
 * `regions` is undefined when the decision was reached before the basic
 * analysis (control failure, 46,XX male, sY254/sY255 discordance).
 */
export interface ClassificationResult {
  readonly label: ClassificationLabel;
  readonly prognosis: TesePrognosis | undefined;
  readonly notes: readonly DiagnosticNote[];
  readonly regions: RegionDeletions | undefined;
  readonly guideline: string;
}
