import { z } from 'zod';

import type { LogLevel } from './logger.js';

const logLevels = ['trace', 'debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export const loggerEnvSchema = z.object({
  CURRENCY_DATA_LOG_LEVEL: z.enum(logLevels).default('warn'),
  CURRENCY_DATA_LOG_COLOR: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('production'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate logger-related environment variables.
 * Issues are flattened into a single message, one line per variable.
 */
export function parseLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}
