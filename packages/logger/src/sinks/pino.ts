import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino';

import type { LogEntry, Sink } from '../logger.js';

export interface PinoSinkOptions {
  /** Defaults to a synchronous stderr destination */
  destination?: DestinationStream | undefined;
  service?: string | undefined;
}

/**
 * Structured JSON sink backed by pino. Level filtering already happened in the
 * category logger, so the pino instance accepts everything down to trace.
 */
export class PinoSink implements Sink {
  private readonly logger: PinoLogger;

  constructor(options?: PinoSinkOptions) {
    const destination = options?.destination ?? pino.destination({ dest: 2, sync: true });
    this.logger = pino(
      {
        base: { service: options?.service ?? 'clientledger' },
        level: 'trace',
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      destination
    );
  }

  write(entry: LogEntry): void {
    this.logger[entry.level]({ category: entry.category, ...entry.context }, entry.msg);
  }

  flush(): void {
    this.logger.flush();
  }
}
