import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { MarkerFileAccessError, MarkerFileNotFoundError } from '../cli-error.js';
import { readTextFile } from '../file-utils.js';

describe('readTextFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ydel-file-utils-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read file content', async () => {
    const path = join(dir, 'sample.tsv');
    writeFileSync(path, 'sY14\tpresent\n');

    const result = await readTextFile(path);

    expect(result._unsafeUnwrap()).toBe('sY14\tpresent\n');
  });

  it('should map a missing file to MarkerFileNotFoundError', async () => {
    const path = join(dir, 'missing.tsv');

    const error = (await readTextFile(path))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(MarkerFileNotFoundError);
    expect(error.message).toBe(`Marker file not found: ${path}`);
  });

  it('should map a directory to MarkerFileAccessError', async () => {
    const error = (await readTextFile(dir))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(MarkerFileAccessError);
    expect(error.message).toBe(`Cannot read marker file ${dir}: path is a directory`);
  });
});
