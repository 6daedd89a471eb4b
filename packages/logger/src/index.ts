export {
  initLogger,
  getLogger,
  flushLoggers,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { FileSink, type FileSinkOptions } from './sinks/file.js';
export { PinoSink, type PinoSinkOptions } from './sinks/pino.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
