import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries kept between drains; the oldest are dropped beyond this */
  maxBuffer?: number | undefined;
}

/**
 * Base class for sinks that collect entries during a tick and hand them over
 * as one batch, so the routing loop never waits on output.
 *
 * Subclasses implement `writeBatch(entries)`. When entries were dropped the
 * batch starts with a warn entry carrying the dropped count.
 */
export abstract class BufferedSink implements Sink {
  private pending: LogEntry[] = [];
  private scheduled = false;
  private dropped = 0;
  private readonly maxBuffer: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = options?.maxBuffer ?? 1000;
  }

  protected abstract writeBatch(entries: readonly LogEntry[]): void;

  write(entry: LogEntry): void {
    if (this.pending.length >= this.maxBuffer) {
      this.dropped++;
      this.pending.shift();
    }
    this.pending.push(entry);
    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /** Drain synchronously. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    const batch = this.pending;
    const dropped = this.dropped;
    this.pending = [];
    this.scheduled = false;
    this.dropped = 0;

    if (dropped > 0) {
      batch.unshift({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
        context: { dropped },
      });
    }

    if (batch.length > 0) {
      this.writeBatch(batch);
    }
  }
}
