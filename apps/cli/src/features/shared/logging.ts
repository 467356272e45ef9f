import { ConsoleSink, initLogger, parseLoggerEnv, type LineStream, type LoggerEnvConfig } from '@curdata/logger';
import { err, ok, type Result } from 'neverthrow';

/**
 * Read the logging environment and install a console sink on stderr.
 */
export function setupLogging(
  env: NodeJS.ProcessEnv = process.env,
  stream: LineStream = process.stderr
): Result<LoggerEnvConfig, Error> {
  let config: LoggerEnvConfig;
  try {
    config = parseLoggerEnv(env);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }

  initLogger({
    level: config.CURRENCY_DATA_LOG_LEVEL,
    sinks: [new ConsoleSink({ color: config.CURRENCY_DATA_LOG_COLOR, stream })],
  });
  return ok(config);
}
