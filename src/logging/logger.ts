/**
 * Base Logger Configuration
 *
 * Pino logger setup with environment-based configuration.
 * Emits structured JSON suitable for piping into log processors.
 */

import { pino, type LoggerOptions } from 'pino';

/**
 * Log level mapping by environment
 */
const LOG_LEVELS = {
  development: 'debug',
  production: 'info',
  test: 'silent',
} as const;

function isKnownEnvironment(value: string): value is keyof typeof LOG_LEVELS {
  return value in LOG_LEVELS;
}

/**
 * Get environment variables with defaults
 */
const NODE_ENV = process.env.NODE_ENV || 'development';
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (isKnownEnvironment(NODE_ENV) ? LOG_LEVELS[NODE_ENV] : 'info');

/**
 * Base logger configuration
 */
const loggerConfig: LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
};

/**
 * Base logger instance
 *
 * Component loggers are derived from it via createServiceLogger()
 * in logger-factory.ts.
 */
export const logger = pino(loggerConfig);

export type Logger = typeof logger;

export { LOG_LEVEL, NODE_ENV };
