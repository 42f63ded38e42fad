import { flushLoggers } from '@ydel/logger';

/**
 * Semantic exit codes for the CLI.
 * Values follow the POSIX-style table shared by every command.
 */
export const ExitCodes = {
  /** Successful execution, including any classification label */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Marker file not found */
  NOT_FOUND: 4,

  /** Marker input rejected: parse error, conflicting duplicate or missing required marker */
  VALIDATION_ERROR: 8,

  /** Invalid environment configuration */
  CONFIG_ERROR: 11,

  /** Marker file not readable */
  PERMISSION_DENIED: 13,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/** Exit codes a failed command ends with. */
export type FailureExitCode = Exclude<ExitCode, typeof ExitCodes.SUCCESS>;

/**
 * Flush pending log entries and exit with a specific exit code.
 * Use this instead of process.exit() so buffered logs are not lost.
 */
export function exitWithCode(code: ExitCode): never {
  flushLoggers();
  process.exit(code);
}
