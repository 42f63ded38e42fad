import pc from 'picocolors';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean;
  /** Where to write lines. Defaults to a stderr writer so stdout stays reserved for command output. */
  write?: (line: string) => void;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  trace: pc.gray,
  debug: pc.cyan,
  info: pc.green,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Human-readable sink.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {context}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly writeLine: (line: string) => void;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
    this.writeLine = options?.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  }

  protected writeBatch(entries: readonly LogEntry[]): void {
    for (const entry of entries) {
      this.writeLine(this.formatEntry(entry));
    }
  }

  private formatEntry(entry: LogEntry): string {
    const time = this.formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';
    return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? LEVEL_COLORS[level](upper) : upper;
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return `{${pairs.join(', ')}}`;
  }
}
