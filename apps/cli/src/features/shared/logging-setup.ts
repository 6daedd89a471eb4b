import { getLoggingEnv, type LogFormat } from '@clientledger/env';
import { ConsoleSink, FileSink, initLogger, PinoSink, type LogLevel, type Sink } from '@clientledger/logger';

export interface CliLoggingOptions {
  verbose: number;
  logFormat?: LogFormat | undefined;
  logFile?: string | undefined;
}

export interface CliLogging {
  level: LogLevel;
  /** Flush every sink and release the log file, if any */
  close(): void;
}

/**
 * Map -v occurrences to a level: none keeps the configured default,
 * then info, debug and trace.
 */
export function resolveLogLevel(verbose: number, fallback: LogLevel): LogLevel {
  if (verbose <= 0) return fallback;
  if (verbose === 1) return 'info';
  if (verbose === 2) return 'debug';
  return 'trace';
}

/**
 * Install the sinks for one CLI run. Everything goes to stderr so stdout
 * carries only CSV.
 */
export function configureCliLogging(options: CliLoggingOptions): CliLogging {
  const env = getLoggingEnv();
  const level = resolveLogLevel(options.verbose, env.level);
  const format = options.logFormat ?? env.format;

  const sinks: Sink[] = [format === 'json' ? new PinoSink() : new ConsoleSink({ color: env.color })];
  const fileSink = options.logFile ? new FileSink({ path: options.logFile }) : undefined;
  if (fileSink) {
    sinks.push(fileSink);
  }

  initLogger({ level, sinks });

  return {
    level,
    close: () => {
      for (const sink of sinks) {
        sink.flush();
      }
      fileSink?.close();
    },
  };
}
