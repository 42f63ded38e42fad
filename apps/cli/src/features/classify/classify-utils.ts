// Pure helpers for the classify command: TSV reading and completeness checks.

import {
  getErrorMessage,
  ParseError,
  requiredMarkersFor,
  type AnalysisDepth,
  type MarkerName,
  type MarkerPanel,
  type RawMarkerRow,
} from '@ydel/core';
import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

/**
 * Completeness of a panel against the marker set of one analysis depth.
 */
export interface ValidationSummary {
  depth: AnalysisDepth;
  required: number;
  tested: number;
  missing: MarkerName[];
  complete: boolean;
}

const TsvRecordsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number().int().positive() }),
  })
);

/**
 * Read `marker<TAB>status` text into raw rows.
 *
 * Blank lines and `#` comments are skipped but still counted, so `line` always
 * matches the line number in the file. Columns after the second are ignored.
 */
export function parseMarkerTsv(content: string): Result<RawMarkerRow[], ParseError> {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      comment: '#',
      delimiter: '\t',
      info: true,
      quote: false,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    return err(new ParseError(1, getErrorMessage(error), content.trim()));
  }

  const records = TsvRecordsSchema.safeParse(parsed);
  if (!records.success) {
    return err(new ParseError(1, 'unreadable marker table', content.trim()));
  }

  const rows: RawMarkerRow[] = [];
  for (const { record, info } of records.data) {
    if (record.every((field) => field.trim() === '')) {
      continue;
    }

    const [name = '', status] = record;
    if (status === undefined) {
      return err(new ParseError(info.lines, 'expected marker and status separated by a tab', record.join('\t')));
    }

    rows.push({ name, status, line: info.lines });
  }

  if (rows.length === 0) {
    return err(new ParseError(1, 'file contains no marker rows', content.trim()));
  }

  return ok(rows);
}

export function buildValidationSummary(panel: MarkerPanel, depth: AnalysisDepth): ValidationSummary {
  const required = requiredMarkersFor(depth);
  const missing = panel.validateCompleteness(required);

  return {
    depth,
    required: required.length,
    tested: required.length - missing.length,
    missing,
    complete: missing.length === 0,
  };
}
