import { classify, EAA_EMQN_2023, MarkerPanel, type ClassificationResult } from '@ydel/core';
import { describe, expect, it } from 'vitest';

import type { ValidationSummary } from './classify-utils.js';
import { formatClassificationLines, formatClassificationReport, formatValidationLines } from './classify-view-utils.js';

const NORMAL_BASIC = {
  sY14: 'present',
  'ZFX/ZFY': 'present',
  sY84: 'present',
  sY86: 'present',
  sY127: 'present',
  sY134: 'present',
  sY254: 'present',
  sY255: 'present',
};

function classifyRecord(record: Record<string, string>): { panel: MarkerPanel; result: ClassificationResult } {
  const panel = MarkerPanel.fromRecord(record)._unsafeUnwrap();
  return { panel, result: classify(panel)._unsafeUnwrap() };
}

describe('classify-view-utils', () => {
  describe('formatClassificationLines', () => {
    it('should print the label with its TESE prognosis', () => {
      const { result } = classifyRecord({ ...NORMAL_BASIC, sY254: 'absent', sY255: 'absent', sY160: 'present' });

      expect(formatClassificationLines(result)).toEqual(['COMPLETE_AZFC_DELETION_B2/B4 (TESE: approximately_50_percent)']);
    });

    it('should print the bare label and indented notes when there is no prognosis', () => {
      const { result } = classifyRecord(NORMAL_BASIC);

      expect(formatClassificationLines(result)).toEqual([
        'NO_DELETION_DETECTED',
        '  - gr/gr markers not tested: sY1291, sY1191; partial AZFc deletions cannot be excluded',
      ]);
    });
  });

  describe('formatValidationLines', () => {
    it('should confirm a complete panel', () => {
      const summary: ValidationSummary = { depth: 'basic', required: 8, tested: 8, missing: [], complete: true };

      expect(formatValidationLines(summary)).toEqual(['All required markers are present (basic analysis).']);
    });

    it('should list missing markers', () => {
      const summary: ValidationSummary = {
        depth: 'extension',
        required: 21,
        tested: 19,
        missing: ['sY1291', 'sY1191'],
        complete: false,
      };

      expect(formatValidationLines(summary)).toEqual([
        'Missing 2 required markers (extension analysis):',
        '  - sY1291',
        '  - sY1191',
      ]);
    });
  });

  describe('formatClassificationReport', () => {
    it('should render header, marker summary, notes, recommendations and untested markers', () => {
      const { panel, result } = classifyRecord(NORMAL_BASIC);
      const lines = formatClassificationReport(panel, result, EAA_EMQN_2023).split('\n');

      expect(lines.slice(0, 5)).toEqual([
        '=== Y-CHROMOSOMAL MICRODELETION ANALYSIS REPORT ===',
        '',
        'CLASSIFICATION: NO_DELETION_DETECTED',
        'GUIDELINE: EAA/EMQN best practice guidelines for Y-chromosomal microdeletions (2023) (eaa-emqn-2023)',
        '',
      ]);

      const summaryStart = lines.indexOf('MARKER SUMMARY:');
      expect(lines.slice(summaryStart, summaryStart + 15)).toEqual([
        'MARKER SUMMARY:',
        'Control markers:',
        '  sY14: present',
        '  ZFX/ZFY: present',
        '',
        'Basic AZF markers:',
        '  AZFa:',
        '    sY84: present',
        '    sY86: present',
        '  AZFb:',
        '    sY127: present',
        '    sY134: present',
        '  AZFc:',
        '    sY254: present',
        '    sY255: present',
      ]);

      const extensionStart = lines.indexOf('Extension markers:');
      expect(lines.slice(extensionStart + 1, extensionStart + 4)).toEqual([
        '  AZFa:',
        '    sY82: not_tested',
        '    sY1064: not_tested',
      ]);
      expect(lines).toContain('  gr/gr:');

      const notesStart = lines.indexOf('NOTES:');
      expect(lines[notesStart + 1]).toBe(
        '- gr/gr markers not tested: sY1291, sY1191; partial AZFc deletions cannot be excluded'
      );

      const recommendationsStart = lines.indexOf('CLINICAL RECOMMENDATIONS:');
      expect(lines.slice(recommendationsStart + 1, recommendationsStart + 3)).toEqual([
        '- No Y-chromosomal microdeletion detected',
        '- Consider other causes of infertility',
      ]);

      const warningStart = lines.indexOf('WARNING: The following markers were not tested:');
      expect(lines[warningStart + 1]).toBe('  - sY82');
      expect(lines[warningStart + 13]).toBe('  - sY1191');
      expect(lines[warningStart + 14]).toBe('Complete testing is recommended for accurate diagnosis.');

      expect(lines.slice(-2)).toEqual(['', '='.repeat(50)]);
    });

    it('should include the prognosis and omit the warning for a complete panel', () => {
      const { panel, result } = classifyRecord({
        ...NORMAL_BASIC,
        sY254: 'absent',
        sY255: 'absent',
        sY82: 'present',
        sY1064: 'present',
        sY1065: 'present',
        sY1182: 'present',
        sY88: 'present',
        sY105: 'present',
        sY121: 'present',
        sY1224: 'present',
        sY1192: 'present',
        sY153: 'present',
        sY160: 'present',
        sY1291: 'absent',
        sY1191: 'absent',
      });
      const lines = formatClassificationReport(panel, result, EAA_EMQN_2023).split('\n');

      expect(lines[3]).toBe('TESE PROGNOSIS: approximately 50%');
      expect(lines).not.toContain('NOTES:');
      expect(lines).not.toContain('WARNING: The following markers were not tested:');
    });
  });
});
