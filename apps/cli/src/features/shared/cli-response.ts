import { YdelError } from '@ydel/core';

import { ExitCodes, type FailureExitCode } from './exit-codes.js';

const ERROR_CODES = {
  [ExitCodes.GENERAL_ERROR]: 'GENERAL_ERROR',
  [ExitCodes.INVALID_ARGS]: 'INVALID_ARGS',
  [ExitCodes.NOT_FOUND]: 'NOT_FOUND',
  [ExitCodes.VALIDATION_ERROR]: 'VALIDATION_ERROR',
  [ExitCodes.CONFIG_ERROR]: 'CONFIG_ERROR',
  [ExitCodes.PERMISSION_DENIED]: 'PERMISSION_DENIED',
} as const satisfies Record<FailureExitCode, string>;

export type ErrorCode = (typeof ERROR_CODES)[FailureExitCode];

export interface CLIErrorBody {
  code: ErrorCode;
  message: string;
  /** Structured context of marker-input errors (row, marker, missing list) */
  details?: Record<string, unknown> | undefined;
}

/**
 * Envelope printed to stdout by every `--json` command. `data` and
 * `duration_ms` are set on success, `error` on failure.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;
  timestamp: string;
  duration_ms?: number | undefined;
  data?: T | undefined;
  error?: CLIErrorBody | undefined;
}

export function errorCodeFor(exitCode: FailureExitCode): ErrorCode {
  return ERROR_CODES[exitCode];
}

export function successResponse<T>(command: string, data: T, durationMs: number): CLIResponse<T> {
  return { success: true, command, timestamp: new Date().toISOString(), duration_ms: durationMs, data };
}

export function errorResponse(command: string, error: Error, exitCode: FailureExitCode): CLIResponse<never> {
  const body: CLIErrorBody = { code: errorCodeFor(exitCode), message: error.message };
  if (error instanceof YdelError && error.context) {
    body.details = error.context;
  }
  return { success: false, command, timestamp: new Date().toISOString(), error: body };
}
