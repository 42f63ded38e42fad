import { describe, expect, it } from 'vitest';

import { CLASSIFICATION_LABELS, TESE_PROGNOSES } from '../classification-types.js';
import { PROGNOSIS_DESCRIPTIONS, RECOMMENDATIONS, recommendationsFor } from '../recommendations.js';

describe('recommendations', () => {
  it('should extend the published labels with the AZFc and AZFbc undetermined subtypes only', () => {
    expect(CLASSIFICATION_LABELS).toHaveLength(15);
    expect(CLASSIFICATION_LABELS.filter((label) => label.endsWith('_SUBTYPE_UNDETERMINED'))).toEqual([
      'AZFB_DELETION_SUBTYPE_UNDETERMINED',
      'AZFC_DELETION_SUBTYPE_UNDETERMINED',
      'AZFBC_DELETION_SUBTYPE_UNDETERMINED',
    ]);
  });

  it('should provide at least one recommendation for every label', () => {
    for (const label of CLASSIFICATION_LABELS) {
      expect(RECOMMENDATIONS[label].length).toBeGreaterThan(0);
    }
  });

  it('should describe every prognosis tag', () => {
    expect(TESE_PROGNOSES.map((prognosis) => PROGNOSIS_DESCRIPTIONS[prognosis])).toEqual([
      'not possible',
      'virtually impossible',
      'possible',
      'approximately 50%',
      'may be positive',
      'undetermined',
      'not applicable',
    ]);
  });

  it('should advise against TESE for a complete AZFa deletion', () => {
    expect(recommendationsFor('COMPLETE_AZFA_DELETION')).toEqual([
      'TESE not recommended (sperm retrieval virtually impossible)',
      'Consider donor sperm or adoption',
      'Genetic counseling: the deletion is transmitted to all male offspring',
    ]);
  });

  it('should mention germ cell tumor risk for gr/gr', () => {
    expect(recommendationsFor('PARTIAL_AZFC_GR/GR_DELETION')).toContain(
      'Increased risk of testicular germ cell tumors'
    );
  });
});
