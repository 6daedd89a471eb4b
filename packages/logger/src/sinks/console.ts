import pc from 'picocolors';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
}

const levelColors: Record<LogLevel, (text: string) => string> = {
  trace: pc.gray,
  debug: pc.cyan,
  info: pc.green,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Human-readable sink. Every level goes to stderr: stdout is reserved for the
 * CSV the CLI produces.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {context}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
  }

  protected writeBatch(entries: readonly LogEntry[]): void {
    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }

  private writeEntry(entry: LogEntry): void {
    const time = this.formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const category = `[${entry.category}]`;
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';

    const message = `${time} ${level} ${category} ${entry.msg}${context}`;

    if (entry.level === 'warn') {
      console.warn(message);
    } else {
      console.error(message);
    }
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? levelColors[level](upper) : upper;
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs: string[] = [];
    for (const [key, value] of Object.entries(context)) {
      pairs.push(`${key}=${JSON.stringify(value)}`);
    }
    return `{${pairs.join(', ')}}`;
  }
}
