/**
 * Error hierarchy for marker input and classification.
 *
 * Errors are returned inside neverthrow `Result`s rather than thrown; the CLI
 * maps each `code` to an exit code.
 */

import type { MarkerName } from '../markers/marker-vocabulary.js';

/**
 * Base error for everything the classifier can reject.
 */
export abstract class YdelError extends Error {
  abstract readonly code: string;

  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.context = context;
    this.name = this.constructor.name;
  }
}

/**
 * Malformed input row: bad status, unknown marker or missing column.
 * `row` is 1-based.
 */
export class ParseError extends YdelError {
  readonly code = 'PARSE_ERROR';

  constructor(
    public readonly row: number,
    public readonly reason: string,
    public readonly rawText: string
  ) {
    super(`Row ${row}: ${reason} (${JSON.stringify(rawText)})`, { row, rawText });
  }
}

/**
 * Same marker reported twice with different statuses.
 */
export class DuplicateMarkerError extends YdelError {
  readonly code = 'DUPLICATE_MARKER';

  constructor(
    public readonly marker: MarkerName,
    public readonly firstRow: number,
    public readonly secondRow: number
  ) {
    super(`Marker ${marker} is reported with conflicting statuses in rows ${firstRow} and ${secondRow}`, {
      marker,
      firstRow,
      secondRow,
    });
  }
}

/**
 * Control or basic markers were not tested, so no verdict can be reached.
 * Lists every missing marker at once.
 */
export class MissingRequiredMarkerError extends YdelError {
  readonly code = 'MISSING_REQUIRED_MARKER';

  constructor(public readonly missing: readonly MarkerName[]) {
    super(`Missing required markers: ${missing.join(', ')}`, { missing });
  }
}

export type PanelBuildError = ParseError | DuplicateMarkerError;
