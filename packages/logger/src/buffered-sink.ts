import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries held between drains; the oldest are dropped past this. Defaults to 200. */
  capacity?: number;
}

/**
 * Sink that queues entries and hands them to `writeBatch` in one call, either
 * on the next turn of the event loop or on `flush()`.
 */
export abstract class BufferedSink implements Sink {
  private pending: LogEntry[] = [];
  private overflow = 0;
  private timer?: NodeJS.Immediate | undefined;
  private readonly capacity: number;

  constructor(options?: BufferedSinkOptions) {
    this.capacity = Math.max(1, options?.capacity ?? 200);
  }

  protected abstract writeBatch(entries: readonly LogEntry[]): void;

  write(entry: LogEntry): void {
    if (this.pending.length === this.capacity) {
      this.pending.shift();
      this.overflow++;
    }
    this.pending.push(entry);
    if (!this.timer) {
      this.timer = setImmediate(() => this.flush());
    }
  }

  flush(): void {
    if (this.timer) {
      clearImmediate(this.timer);
      this.timer = undefined;
    }
    if (this.pending.length === 0) return;

    const batch = this.overflow > 0 ? [this.overflowNotice(this.pending[0]), ...this.pending] : this.pending;
    this.pending = [];
    this.overflow = 0;
    this.writeBatch(batch);
  }

  private overflowNotice(first: LogEntry | undefined): LogEntry {
    return {
      level: 'warn',
      category: 'logger',
      timestamp: first?.timestamp ?? new Date(),
      msg: `${String(this.overflow)} earlier log entries discarded`,
      context: { capacity: this.capacity },
    };
  }
}
