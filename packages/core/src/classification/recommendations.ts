import type { ClassificationLabel, TesePrognosis } from './classification-types.js';

const NO_TESE = 'TESE not recommended (sperm retrieval virtually impossible)';
const DONOR = 'Consider donor sperm or adoption';
const TRANSMISSION = 'Genetic counseling: the deletion is transmitted to all male offspring';
const KARYOTYPE_MOSAICISM = 'Karyotype analysis recommended to rule out 46,XY/45,X mosaicism';
const EXTENSION = 'Complete the extension analysis before counseling on TESE';

/**
 * Clinical recommendation lines shown in the verbose report, per label.
 */
export const RECOMMENDATIONS: Readonly<Record<ClassificationLabel, readonly string[]>> = {
  NO_DELETION_DETECTED: ['No Y-chromosomal microdeletion detected', 'Consider other causes of infertility'],
  '46,XX_MALE_OR_COMPLETE_Y_CHROMOSOME_ABSENCE': [
    'Karyotype confirmation recommended',
    'TESE not possible',
    'Genetic counseling recommended',
  ],
  METHODOLOGICAL_ERROR: [
    'Results are not interpretable; repeat the PCR with fresh controls',
    'Do not report a deletion until the discordance is resolved',
  ],
  COMPLETE_AZFA_DELETION: [NO_TESE, DONOR, TRANSMISSION],
  'COMPLETE_AZFB_DELETION_P5/PROXIMAL_P1': [NO_TESE, DONOR, TRANSMISSION],
  PARTIAL_AZFB_DELETION: ['TESE may be attempted (sY1192 retained)', TRANSMISSION],
  AZFB_DELETION_SUBTYPE_UNDETERMINED: ['Test sY1192 to establish the TESE prognosis', EXTENSION],
  'COMPLETE_AZFC_DELETION_B2/B4': [
    'TESE may be attempted (approximately 50% success rate)',
    'Consider sperm cryopreservation if sperm are present in the ejaculate',
    TRANSMISSION,
    KARYOTYPE_MOSAICISM,
  ],
  TERMINAL_AZFC_DELETION: ['Karyotype analysis strongly recommended', 'Check for 46,XY/45,X mosaicism', TRANSMISSION],
  AZFC_DELETION_SUBTYPE_UNDETERMINED: ['Test sY160 to distinguish a b2/b4 from a terminal deletion', EXTENSION],
  'PARTIAL_AZFC_GR/GR_DELETION': [
    'Population-specific risk factor for impaired spermatogenesis',
    'Increased risk of testicular germ cell tumors',
    'Transmitted to male offspring',
  ],
  'COMPLETE_AZFBC_DELETION_P5/DISTAL_P1': [NO_TESE, DONOR, TRANSMISSION, KARYOTYPE_MOSAICISM],
  'COMPLETE_AZFBC_DELETION_P4/DISTAL_P1': [
    'TESE may be positive in rare cases; counsel on the low success rate',
    TRANSMISSION,
    KARYOTYPE_MOSAICISM,
  ],
  AZFBC_DELETION_SUBTYPE_UNDETERMINED: ['Test sY105 and sY121 to determine the AZFbc breakpoints', EXTENSION],
  COMPLETE_AZFABC_DELETION: ['Karyotype analysis required', 'TESE not possible', DONOR],
};

export const PROGNOSIS_DESCRIPTIONS: Readonly<Record<TesePrognosis, string>> = {
  not_possible: 'not possible',
  virtually_impossible: 'virtually impossible',
  possible: 'possible',
  approximately_50_percent: 'approximately 50%',
  may_be_positive: 'may be positive',
  undetermined: 'undetermined',
  not_applicable: 'not applicable',
};

export function recommendationsFor(label: ClassificationLabel): readonly string[] {
  return RECOMMENDATIONS[label];
}
