import { YdelError } from '@ydel/core';

import { ExitCodes, type FailureExitCode } from './exit-codes.js';

/**
 * The marker file passed on the command line does not exist.
 */
export class MarkerFileNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Marker file not found: ${path}`);
    this.name = 'MarkerFileNotFoundError';
  }
}

/**
 * The marker file exists but cannot be read.
 */
export class MarkerFileAccessError extends Error {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Cannot read marker file ${path}: ${reason}`);
    this.name = 'MarkerFileAccessError';
  }
}

/**
 * An option value was well-formed but names something that does not exist.
 */
export class InvalidOptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptionError';
  }
}

/**
 * Map an error returned by a handler to the exit code the CLI reports.
 */
export function exitCodeForError(error: Error): FailureExitCode {
  if (error instanceof YdelError) {
    return ExitCodes.VALIDATION_ERROR;
  }
  if (error instanceof MarkerFileNotFoundError) {
    return ExitCodes.NOT_FOUND;
  }
  if (error instanceof MarkerFileAccessError) {
    return ExitCodes.PERMISSION_DENIED;
  }
  if (error instanceof InvalidOptionError) {
    return ExitCodes.INVALID_ARGS;
  }
  return ExitCodes.GENERAL_ERROR;
}
