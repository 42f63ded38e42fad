import { promises as fs } from 'node:fs';

import { isErrnoException, toError } from '@ydel/core';
import { err, ok, type Result } from 'neverthrow';

import { MarkerFileAccessError, MarkerFileNotFoundError } from './cli-error.js';

export type ReadFileError = MarkerFileNotFoundError | MarkerFileAccessError;

/**
 * Read a UTF-8 text file, mapping the usual filesystem failures to typed errors.
 */
export async function readTextFile(path: string): Promise<Result<string, ReadFileError>> {
  try {
    return ok(await fs.readFile(path, 'utf8'));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return err(new MarkerFileNotFoundError(path));
    }
    if (isErrnoException(error) && error.code === 'EISDIR') {
      return err(new MarkerFileAccessError(path, 'path is a directory'));
    }
    return err(new MarkerFileAccessError(path, toError(error).message));
  }
}
