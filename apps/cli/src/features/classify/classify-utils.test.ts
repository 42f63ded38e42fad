import { MarkerPanel, ParseError } from '@ydel/core';
import { describe, expect, it } from 'vitest';

import { buildValidationSummary, parseMarkerTsv } from './classify-utils.js';

describe('classify-utils', () => {
  describe('parseMarkerTsv', () => {
    it('should return one row per data line with its line number', () => {
      const result = parseMarkerTsv('sY14\tpresent\nsY84\tabsent\n');

      expect(result._unsafeUnwrap()).toEqual([
        { name: 'sY14', status: 'present', line: 1 },
        { name: 'sY84', status: 'absent', line: 2 },
      ]);
    });

    it('should skip blank and comment lines but keep counting them', () => {
      const result = parseMarkerTsv('# run 7\n\nsY14\tpresent\n   \nsY84\tabsent');

      expect(result._unsafeUnwrap()).toEqual([
        { name: 'sY14', status: 'present', line: 3 },
        { name: 'sY84', status: 'absent', line: 5 },
      ]);
    });

    it('should strip carriage returns and ignore extra columns', () => {
      const result = parseMarkerTsv('sY14\tpresent\tcontrol ok\r\nsY84\tabsent\r\n');

      expect(result._unsafeUnwrap()).toEqual([
        { name: 'sY14', status: 'present', line: 1 },
        { name: 'sY84', status: 'absent', line: 2 },
      ]);
    });

    it('should drop a byte order mark', () => {
      const result = parseMarkerTsv('\uFEFFsY14\tpresent\nsY84\tabsent\n');

      expect(result._unsafeUnwrap()).toEqual([
        { name: 'sY14', status: 'present', line: 1 },
        { name: 'sY84', status: 'absent', line: 2 },
      ]);
    });

    it('should keep quote characters as part of a field', () => {
      const result = parseMarkerTsv('"sY14\tpresent\n');

      expect(result._unsafeUnwrap()).toEqual([{ name: '"sY14', status: 'present', line: 1 }]);
    });

    it('should pass a header row through for the panel to skip', () => {
      const result = parseMarkerTsv('marker\tstatus\nsY14\tpresent\n');

      expect(result._unsafeUnwrap()[0]).toEqual({ name: 'marker', status: 'status', line: 1 });
    });

    it('should reject a line without a status column', () => {
      const result = parseMarkerTsv('sY14\tpresent\nsY84 absent\n');

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(ParseError);
      expect(error.row).toBe(2);
      expect(error.rawText).toBe('sY84 absent');
      expect(error.message).toBe('Row 2: expected marker and status separated by a tab ("sY84 absent")');
    });

    it('should reject an empty file', () => {
      const error = parseMarkerTsv('')._unsafeUnwrapErr();

      expect(error.message).toBe('Row 1: file contains no marker rows ("")');
    });

    it('should reject a file with only comments', () => {
      const error = parseMarkerTsv('# nothing yet\n\n')._unsafeUnwrapErr();

      expect(error.reason).toBe('file contains no marker rows');
    });
  });

  describe('buildValidationSummary', () => {
    const basicPanel = MarkerPanel.fromRecord({
      sY14: 'present',
      'ZFX/ZFY': 'present',
      sY84: 'present',
      sY86: 'present',
      sY127: 'present',
      sY134: 'present',
      sY254: 'present',
      sY255: 'present',
    })._unsafeUnwrap();

    it('should report a complete basic panel', () => {
      expect(buildValidationSummary(basicPanel, 'basic')).toEqual({
        depth: 'basic',
        required: 8,
        tested: 8,
        missing: [],
        complete: true,
      });
    });

    it('should list every extension marker a basic panel lacks', () => {
      const summary = buildValidationSummary(basicPanel, 'extension');

      expect(summary.complete).toBe(false);
      expect(summary.required).toBe(21);
      expect(summary.tested).toBe(8);
      expect(summary.missing).toEqual([
        'sY82',
        'sY1064',
        'sY1065',
        'sY1182',
        'sY88',
        'sY105',
        'sY121',
        'sY1224',
        'sY1192',
        'sY153',
        'sY160',
        'sY1291',
        'sY1191',
      ]);
    });
  });
});
