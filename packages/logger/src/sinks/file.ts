import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions extends BufferedSinkOptions {
  path: string;
}

/**
 * Appends one JSON object per entry. Context keys sit beside `time`, `level`,
 * `category` and `msg` so a run's sample, label and guideline can be filtered
 * with line tools; a context key never overrides those four.
 */
export class FileSink extends BufferedSink {
  private readonly path: string;

  constructor(options: FileSinkOptions) {
    super(options);
    this.path = options.path;
    mkdirSync(dirname(this.path), { recursive: true });
  }

  protected writeBatch(entries: readonly LogEntry[]): void {
    const chunk = entries.map((entry) => `${JSON.stringify(toRecord(entry))}\n`).join('');
    appendFileSync(this.path, chunk, 'utf8');
  }
}

function toRecord(entry: LogEntry): Record<string, unknown> {
  return {
    ...entry.context,
    time: entry.timestamp.toISOString(),
    level: entry.level,
    category: entry.category,
    msg: entry.msg,
  };
}
