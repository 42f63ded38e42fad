import { describe, expect, it } from 'vitest';

import { panelWith } from '../../__tests__/test-utils.js';
import { EAA_EMQN_2023, getGuidelineProfile, listGuidelineProfiles, type AzfbcBoundary } from '../guideline-profiles.js';

const BOUNDARY_CASES: [Record<string, string>, AzfbcBoundary][] = [
  [{ sY105: 'present', sY121: 'absent' }, 'P5_DISTAL_P1'],
  [{ sY105: 'present', sY121: 'present' }, 'P4_DISTAL_P1'],
  [{ sY105: 'absent', sY121: 'present' }, 'undetermined'],
  [{ sY105: 'absent', sY121: 'absent' }, 'undetermined'],
  [{ sY105: 'present' }, 'undetermined'],
  [{ sY121: 'absent' }, 'undetermined'],
];

describe('guideline-profiles', () => {
  describe('EAA_EMQN_2023.azfbcBoundary', () => {
    it.each(BOUNDARY_CASES)('should map %o to %s', (calls, expected) => {
      expect(EAA_EMQN_2023.azfbcBoundary(panelWith(calls))).toBe(expected);
    });
  });

  describe('getGuidelineProfile', () => {
    it('should return a registered profile', () => {
      const result = getGuidelineProfile('eaa-emqn-2023');

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toBe(EAA_EMQN_2023);
      }
    });

    it('should reject unknown ids and list the available ones', () => {
      const result = getGuidelineProfile('eaa-2013');

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe("Unknown guideline 'eaa-2013'. Available: eaa-emqn-2023");
      }
    });
  });

  it('should list the built-in profiles', () => {
    expect(listGuidelineProfiles().map((profile) => profile.id)).toEqual(['eaa-emqn-2023']);
  });
});
