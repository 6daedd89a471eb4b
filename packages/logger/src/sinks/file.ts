import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions extends BufferedSinkOptions {
  path: string;
}

/**
 * Appends one JSON object per entry to a log file.
 * The descriptor stays open for the run; call close() after the final flush.
 */
export class FileSink extends BufferedSink {
  private fd: number | undefined;

  constructor(options: FileSinkOptions) {
    super(options);
    mkdirSync(dirname(options.path), { recursive: true });
    this.fd = openSync(options.path, 'a');
  }

  protected writeBatch(entries: readonly LogEntry[]): void {
    if (this.fd === undefined) return;

    const lines = entries.map((entry) =>
      JSON.stringify({
        timestamp: entry.timestamp.toISOString(),
        level: entry.level,
        category: entry.category,
        msg: entry.msg,
        ...(entry.context ? { context: entry.context } : {}),
      })
    );
    // One append per batch
    writeSync(this.fd, `${lines.join('\n')}\n`);
  }

  close(): void {
    this.flush();
    if (this.fd !== undefined) {
      closeSync(this.fd);
      this.fd = undefined;
    }
  }
}
