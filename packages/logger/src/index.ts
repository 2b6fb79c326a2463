export {
  initLogger,
  getLogger,
  flushLoggers,
  serializeLogData,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogData,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, type ConsoleFormat, type ConsoleSinkOptions } from './sinks/console.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { initLoggerFromEnv, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
