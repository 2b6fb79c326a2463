import { z } from 'zod';

import { initLogger } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

const booleanString = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_COLOR: booleanString('false'),
  LOGGER_CONSOLE_ENABLED: booleanString('true'),
  LOGGER_CONSOLE_FORMAT: z.enum(['text', 'json']).default('json'),
  LOGGER_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}

/**
 * Initialise the global logger from LOGGER_* environment variables.
 * Throws a ZodError listing every invalid variable.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const config = validateLoggerEnv(env);

  initLogger({
    level: config.LOGGER_LOG_LEVEL,
    sinks: config.LOGGER_CONSOLE_ENABLED
      ? [new ConsoleSink({ color: config.LOGGER_CONSOLE_COLOR, format: config.LOGGER_CONSOLE_FORMAT })]
      : [],
  });

  return config;
}
