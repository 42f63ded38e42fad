import { describe, expect, it } from 'vitest';

import { ALL_MARKERS, normalizeMarkerName, requiredMarkersFor, sortMarkers } from '../marker-vocabulary.js';

describe('marker-vocabulary', () => {
  describe('normalizeMarkerName', () => {
    it('should return canonical names for exact matches', () => {
      expect(normalizeMarkerName('sY84')).toBe('sY84');
      expect(normalizeMarkerName('ZFX/ZFY')).toBe('ZFX/ZFY');
    });

    it('should ignore case and surrounding whitespace', () => {
      expect(normalizeMarkerName('  SY1192 ')).toBe('sY1192');
      expect(normalizeMarkerName('zfx/zfy')).toBe('ZFX/ZFY');
    });

    it('should map synonyms to canonical names', () => {
      expect(normalizeMarkerName('ZFX/Y')).toBe('ZFX/ZFY');
      expect(normalizeMarkerName('zfx/y')).toBe('ZFX/ZFY');
      expect(normalizeMarkerName('SRY')).toBe('sY14');
    });

    it('should return undefined for unknown markers', () => {
      expect(normalizeMarkerName('sY116')).toBeUndefined();
      expect(normalizeMarkerName('sY8')).toBeUndefined();
      expect(normalizeMarkerName('')).toBeUndefined();
    });
  });

  describe('requiredMarkersFor', () => {
    it('should require control and basic markers for a basic analysis', () => {
      expect(requiredMarkersFor('basic')).toEqual([
        'sY14',
        'ZFX/ZFY',
        'sY84',
        'sY86',
        'sY127',
        'sY134',
        'sY254',
        'sY255',
      ]);
    });

    it('should require every marker for an extension analysis', () => {
      expect(requiredMarkersFor('extension')).toEqual(ALL_MARKERS);
      expect(requiredMarkersFor('extension')).toHaveLength(21);
    });
  });

  it('should sort markers into vocabulary order', () => {
    expect(sortMarkers(['sY1191', 'sY14', 'sY255', 'ZFX/ZFY'])).toEqual(['sY14', 'ZFX/ZFY', 'sY255', 'sY1191']);
  });
});
