import * as p from '@clack/prompts';
import { getLogger } from '@ydel/logger';
import pc from 'picocolors';

import { errorCodeFor, errorResponse, successResponse, type ErrorCode } from './cli-response.js';
import { ExitCodes, exitWithCode, type FailureExitCode } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

/**
 * Tips shown under text-mode errors, keyed by error code.
 */
const ERROR_TIPS: Partial<Record<ErrorCode, { message: string; title: string }>> = {
  INVALID_ARGS: {
    message: 'Check your command arguments and try again.\nRun with --help for usage information.',
    title: 'Tip',
  },
  NOT_FOUND: { message: 'The marker file was not found.\nDouble-check the path and try again.', title: 'Tip' },
  VALIDATION_ERROR: {
    message:
      'Each row must be marker<TAB>status with status present or absent.\nRun `ydel classify <file> --validate-only` to list untested markers.',
    title: 'How to fix',
  },
  CONFIG_ERROR: { message: 'Check the YDEL_* environment variables.', title: 'How to fix' },
};

/**
 * OutputManager handles formatting and displaying CLI output.
 * Supports both human-readable text output and machine-readable JSON.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(private readonly format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  /**
   * Output a success response (json mode only).
   */
  json<T>(command: string, data: T): void {
    if (this.format === 'json') {
      console.log(JSON.stringify(successResponse(command, data, Date.now() - this.startTime), undefined, 2));
    }
  }

  /**
   * Print plain lines to stdout (text mode only).
   */
  lines(lines: readonly string[]): void {
    if (this.format === 'text') {
      console.log(lines.join('\n'));
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: FailureExitCode = ExitCodes.GENERAL_ERROR): never {
    if (this.format === 'json') {
      // stdout, not stderr, so callers can parse the response
      console.log(JSON.stringify(errorResponse(command, error, exitCode), undefined, 2));
    } else {
      this.displayTextError(error, errorCodeFor(exitCode));
    }

    exitWithCode(exitCode);
  }

  private displayTextError(error: Error, code: ErrorCode): void {
    p.log.error(`${pc.red('Error')}: ${error.message}`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      p.note(tip.message, tip.title);
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      logger.debug(`Stack trace:\n${error.stack}`);
    }
  }
}
