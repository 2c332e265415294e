/**
 * Retry engine
 *
 * Error classification, bounded retries with exponential back-off and
 * cancellable waiting.
 */

export { RetryExecutor } from './retry-executor.js';
export type {
  RetryAttempt,
  RetryExecutorDependencies,
  WithRetryOptions,
} from './retry-executor.js';

export { ErrorClassifier } from './error-classifier.js';
export type { ClassifiedError, ErrorClass, ErrorKind } from './error-classifier.js';

export { OperationFailureError, NonRetryableError, RetryExhaustedError } from './errors.js';

export { OperationCancelledError, sleep } from './cancellation.js';
export type { CancellationPhase, SleepFn } from './cancellation.js';
