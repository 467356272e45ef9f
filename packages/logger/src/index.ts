export {
  initLogger,
  getLogger,
  flushLoggers,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions, type LineStream } from './sinks/console.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { loggerEnvSchema, parseLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
