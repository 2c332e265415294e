/**
 * Logger Factory
 *
 * Creates component-specific Pino child loggers with consistent patterns.
 * Provides utility functions for common logging scenarios.
 */

import type { Logger } from 'pino';
import { logger as baseLogger } from './logger.js';

/**
 * Component logger
 * Pino logger bound to a `service` field
 */
export type ServiceLogger = Logger;

/**
 * Create a component-specific logger with structured context
 *
 * @param serviceName - Name of the component (e.g., 'RetryExecutor', 'BatchExecutor')
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('RetryExecutor');
 * logger.info('Starting operation');
 * // Output: {"level":"info","service":"RetryExecutor","msg":"Starting operation"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({
    service: serviceName,
  });
}

/**
 * Common logging patterns
 *
 * Keeps the structure of recurring log lines uniform across components.
 */
export const LogPatterns = {
  /**
   * Log method entry (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodEntry(logger, 'run', { searches: 3 });
   * // Output: {"level":"debug","service":"...","method":"run","params":{"searches":3},"msg":"Entering run"}
   * ```
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Log method exit (debug level)
   *
   * @param result - Optional result summary (avoid logging large objects)
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Log method error (error level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodError(logger, 'run', error, { task: 'react-configs' });
   * // Output: {"level":"error","service":"...","method":"run","error":"...","task":"react-configs","msg":"Error in run"}
   * ```
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: Error,
    context: Record<string, unknown> = {}
  ) => {
    logger.error(
      {
        method,
        error: error.message,
        errorName: error.name,
        stack: error.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },

  /**
   * Log a scheduled retry (warn level)
   *
   * @example
   * ```typescript
   * LogPatterns.retryScheduled(logger, "batch search 'configs'", 1, 2000, 'rate_limit');
   * // Output: {"level":"warn","service":"...","operation":"batch search 'configs'","attempt":1,"delayMs":2000,"errorClass":"rate_limit","msg":"Retryable error, backing off"}
   * ```
   */
  retryScheduled: (
    logger: ServiceLogger,
    operation: string,
    attempt: number,
    delayMs: number,
    errorClass: string
  ) => {
    logger.warn(
      { operation, attempt, delayMs, errorClass },
      'Retryable error, backing off'
    );
  },

  /**
   * Log a pacing delay between operations (debug level)
   */
  delayScheduled: (
    logger: ServiceLogger,
    complexity: string,
    delayMs: number
  ) => {
    logger.debug({ complexity, delayMs }, 'Pausing before next operation');
  },
};

/**
 * Alias for LogPatterns for more concise usage
 *
 * @example
 * ```typescript
 * log.methodEntry(logger, 'myMethod', { param: 'value' });
 * log.methodExit(logger, 'myMethod');
 * ```
 */
export const log = LogPatterns;
