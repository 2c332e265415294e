/**
 * Failures surfaced by the retry engine
 */

import type { ClassifiedError } from './error-classifier.js';

/**
 * Base class for errors that wrap the failure of a labelled operation
 *
 * The original failure is kept as `cause`.
 */
export abstract class OperationFailureError extends Error {
  protected constructor(
    message: string,
    public readonly operation: string,
    cause: unknown
  ) {
    super(message, { cause });
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The operation failed with an error a retry cannot fix
 */
export class NonRetryableError extends OperationFailureError {
  constructor(
    operation: string,
    public readonly classification: ClassifiedError,
    cause: unknown
  ) {
    super(`non-retryable error in ${operation}: ${messageOf(cause)}`, operation, cause);
    this.name = 'NonRetryableError';
  }
}

function exhaustedMessage(
  operation: string,
  retries: number,
  classification: ClassifiedError,
  cause: unknown
): string {
  const detail = messageOf(cause);

  switch (classification.errorClass) {
    case 'rate_limit':
      return [
        `rate limit exceeded during ${operation} after ${retries} retries: ${detail}`,
        '',
        'Suggestions:',
        '  • Wait until your rate limit resets',
        '  • Use authenticated requests for a higher quota',
        '  • Run batch operations less frequently',
        '  • Add delays between operations',
      ].join('\n');
    case 'abuse_detection':
      return [
        `abuse detection triggered during ${operation} after ${retries} retries: ${detail}`,
        '',
        'Suggestions:',
        "  • You're making requests too rapidly",
        '  • Wait at least 1 minute before retrying',
        '  • Use longer delays between batch operations',
        '  • Reduce concurrent operations',
      ].join('\n');
    case 'server_error':
      return [
        `search API server error during ${operation} after ${retries} retries: ${detail}`,
        '',
        'Suggestions:',
        '  • This is a temporary server-side issue',
        "  • Check the API provider's status page",
        '  • Try again later with smaller batch sizes',
      ].join('\n');
    default:
      return `operation ${operation} failed after ${retries} retries: ${detail}`;
  }
}

/**
 * The operation kept failing with a retryable error until the policy ran out
 */
export class RetryExhaustedError extends OperationFailureError {
  constructor(
    operation: string,
    public readonly retryCount: number,
    public readonly classification: ClassifiedError,
    cause: unknown
  ) {
    super(exhaustedMessage(operation, retryCount, classification, cause), operation, cause);
    this.name = 'RetryExhaustedError';
  }
}
