import { getLogger } from '@ydel/logger';
import { err, ok, type Result } from 'neverthrow';

import { DuplicateMarkerError, ParseError, type PanelBuildError } from '../errors/index.js';
import { parseMarkerStatus, type MarkerCall, type MarkerStatus, type RawMarkerRow } from '../schemas/marker-schemas.js';

import { normalizeMarkerName, sortMarkers, type MarkerName } from './marker-vocabulary.js';

const logger = getLogger('MarkerPanel');

const HEADER_NAMES = new Set(['marker', 'marker_name']);
const HEADER_STATUS = 'status';

/**
 * Non-fatal observation made while building a panel.
 */
export interface PanelNote {
  marker: MarkerName;
  rows: readonly number[];
  message: string;
}

interface Entry {
  status: MarkerStatus;
  row: number;
}

function isHeaderRow(row: RawMarkerRow): boolean {
  return HEADER_NAMES.has(row.name.trim().toLowerCase()) && row.status.trim().toLowerCase() === HEADER_STATUS;
}

/**
 * Immutable marker name → status mapping for one sample.
 *
 * A marker that is not in the panel was not tested. `statusOf` reports it as
 * `not_tested` and callers must never read that as `absent`.
 */
export class MarkerPanel {
  private constructor(
    private readonly entries: ReadonlyMap<MarkerName, MarkerStatus>,
    readonly notes: readonly PanelNote[]
  ) {}

  /**
   * Build a panel from raw rows. The first failing row aborts the build.
   *
   * - names are trimmed, case-folded and mapped through the synonym table
   * - a leading `marker`/`status` header row is skipped once
   * - a repeated marker with the same status is kept once and noted
   * - a repeated marker with a different status is a DuplicateMarkerError
   */
  static build(rows: Iterable<RawMarkerRow>): Result<MarkerPanel, PanelBuildError> {
    const seen = new Map<MarkerName, Entry>();
    const duplicates = new Map<MarkerName, number[]>();
    let position = 0;

    for (const row of rows) {
      position++;
      const rowNumber = row.line ?? position;

      if (position === 1 && isHeaderRow(row)) {
        continue;
      }

      const name = normalizeMarkerName(row.name);
      if (!name) {
        return err(new ParseError(rowNumber, 'unrecognized marker name', row.name));
      }

      const status = parseMarkerStatus(row.status);
      if (!status) {
        return err(new ParseError(rowNumber, `invalid status for ${name}, expected present or absent`, row.status));
      }

      const previous = seen.get(name);
      if (!previous) {
        seen.set(name, { status, row: rowNumber });
        continue;
      }

      if (previous.status !== status) {
        return err(new DuplicateMarkerError(name, previous.row, rowNumber));
      }

      const rowsForMarker = duplicates.get(name) ?? [previous.row];
      rowsForMarker.push(rowNumber);
      duplicates.set(name, rowsForMarker);
      logger.warn({ marker: name, rows: rowsForMarker }, 'Marker reported more than once with the same status');
    }

    const notes: PanelNote[] = sortMarkers(duplicates.keys()).map((marker) => {
      const duplicateRows = duplicates.get(marker) ?? [];
      return {
        marker,
        rows: duplicateRows,
        message: `${marker} reported ${duplicateRows.length} times (rows ${duplicateRows.join(', ')}) with the same status`,
      };
    });

    const entries = new Map<MarkerName, MarkerStatus>();
    for (const name of sortMarkers(seen.keys())) {
      const entry = seen.get(name);
      if (entry) entries.set(name, entry.status);
    }

    logger.debug({ markers: entries.size, duplicates: notes.length }, 'Marker panel built');
    return ok(new MarkerPanel(entries, notes));
  }

  /**
   * Build a panel from a name → status record. Intended for programmatic
   * callers and tests; goes through the same validation as `build`.
   */
  static fromRecord(record: Readonly<Record<string, string>>): Result<MarkerPanel, PanelBuildError> {
    return MarkerPanel.build(Object.entries(record).map(([name, status]) => ({ name, status })));
  }

  get size(): number {
    return this.entries.size;
  }

  has(name: MarkerName): boolean {
    return this.entries.has(name);
  }

  statusOf(name: MarkerName): MarkerCall {
    return this.entries.get(name) ?? 'not_tested';
  }

  isPresent(name: MarkerName): boolean {
    return this.entries.get(name) === 'present';
  }

  isAbsent(name: MarkerName): boolean {
    return this.entries.get(name) === 'absent';
  }

  /** Tested markers in vocabulary order. */
  markers(): MarkerName[] {
    return [...this.entries.keys()];
  }

  /**
   * Markers of `required` that are not in the panel, in vocabulary order.
   */
  validateCompleteness(required: Iterable<MarkerName>): MarkerName[] {
    const missing = new Set<MarkerName>();
    for (const name of required) {
      if (!this.entries.has(name)) missing.add(name);
    }
    return sortMarkers(missing);
  }

  toRecord(): Partial<Record<MarkerName, MarkerStatus>> {
    return Object.fromEntries(this.entries);
  }
}
