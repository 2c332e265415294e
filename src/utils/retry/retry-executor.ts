/**
 * RetryExecutor
 *
 * Runs one labelled operation with bounded retries and exponential back-off.
 *
 * Behaviour per attempt:
 * - An aborted signal stops before the attempt starts
 * - Success returns immediately, without any delay
 * - Non-retryable failures are surfaced at once as NonRetryableError
 * - A failure on the last allowed attempt surfaces as RetryExhaustedError
 * - Otherwise the classified delay is slept, racing the abort signal, and
 *   the time actually waited is reported through onDelayed
 *
 * The operation is invoked at most `maxRetries + 1` times and no delay
 * follows the final attempt.
 *
 * @example
 * ```typescript
 * const executor = new RetryExecutor({ policy: createRetryPolicy({ maxRetries: 2 }) });
 *
 * const outcome = await executor.withRetry(
 *   "batch search 'configs'",
 *   () => client.search(task, signal),
 *   { signal, onRetry: () => tracker.recordRetry() }
 * );
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../../config/retry-policy.js';
import { ErrorClassifier, type ClassifiedError } from './error-classifier.js';
import { OperationCancelledError, sleep as defaultSleep, type SleepFn } from './cancellation.js';
import { NonRetryableError, RetryExhaustedError } from './errors.js';

/**
 * Details passed to the onRetry hook before a retry delay starts
 */
export interface RetryAttempt {
  /** Zero-based index of the attempt that failed */
  attempt: number;
  delayMs: number;
  classification: ClassifiedError;
  error: unknown;
}

export interface WithRetryOptions {
  signal?: AbortSignal;
  /** Called once per scheduled retry, before its delay */
  onRetry?: (retry: RetryAttempt) => void;
  /**
   * Called after each retry delay with the time actually waited,
   * which is shorter than planned when the signal aborts mid-delay
   */
  onDelayed?: (elapsedMs: number) => void;
}

export interface RetryExecutorDependencies {
  /**
   * Retry policy
   * @default DEFAULT_RETRY_POLICY
   */
  policy?: RetryPolicy;

  /**
   * Error classifier
   * If not provided, one is created for the policy
   */
  classifier?: ErrorClassifier;

  /**
   * Cancellable sleep, replaceable in tests
   */
  sleep?: SleepFn;

  /**
   * Clock returning epoch milliseconds
   * @default Date.now
   */
  now?: () => number;
}

export class RetryExecutor {
  private readonly policy: RetryPolicy;
  private readonly classifier: ErrorClassifier;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly logger: ServiceLogger;

  constructor(dependencies: RetryExecutorDependencies = {}) {
    this.policy = dependencies.policy ?? DEFAULT_RETRY_POLICY;
    this.classifier = dependencies.classifier ?? new ErrorClassifier(this.policy);
    this.sleep = dependencies.sleep ?? defaultSleep;
    this.now = dependencies.now ?? (() => Date.now());
    this.logger = createServiceLogger('RetryExecutor');
  }

  getPolicy(): RetryPolicy {
    return this.policy;
  }

  getClassifier(): ErrorClassifier {
    return this.classifier;
  }

  /**
   * Execute an operation with retry logic
   *
   * @param label - Operation label used in errors and logs
   * @param operation - Zero-argument async operation
   * @returns The operation's result
   * @throws OperationCancelledError if the signal aborts
   * @throws NonRetryableError on the first permanent failure
   * @throws RetryExhaustedError once the retry budget is spent
   */
  async withRetry<T>(
    label: string,
    operation: () => Promise<T>,
    options: WithRetryOptions = {}
  ): Promise<T> {
    const { signal, onRetry, onDelayed } = options;
    const { maxRetries } = this.policy;

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw new OperationCancelledError('before-attempt', label, { cause: signal.reason });
      }

      try {
        log.methodEntry(this.logger, 'withRetry', { operation: label, attempt, maxRetries });
        const result = await operation();
        log.methodExit(this.logger, 'withRetry', { operation: label, attempt });
        return result;
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          throw error;
        }
        if (signal?.aborted) {
          throw new OperationCancelledError('during-attempt', label, { cause: error });
        }

        const classification = this.classifier.classify(error, attempt);

        if (!classification.retryable) {
          this.logger.error(
            { operation: label, attempt, kind: classification.kind, error: messageOf(error) },
            'Non-retryable error, not retrying'
          );
          throw new NonRetryableError(label, classification, error);
        }

        if (attempt >= maxRetries) {
          this.logger.error(
            { operation: label, attempt, maxRetries, errorClass: classification.errorClass },
            'All retry attempts exhausted'
          );
          throw new RetryExhaustedError(label, maxRetries, classification, error);
        }

        onRetry?.({ attempt, delayMs: classification.delayMs, classification, error });
        log.retryScheduled(
          this.logger,
          label,
          attempt + 1,
          classification.delayMs,
          classification.errorClass
        );

        if (classification.delayMs > 0) {
          await this.waitBeforeRetry(label, classification.delayMs, signal, onDelayed);
        }
      }
    }
  }

  private async waitBeforeRetry(
    label: string,
    delayMs: number,
    signal: AbortSignal | undefined,
    onDelayed: ((elapsedMs: number) => void) | undefined
  ): Promise<void> {
    const startedAt = this.now();
    try {
      await this.sleep(delayMs, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('retry-delay', label, { cause: error });
      }
      throw error;
    } finally {
      onDelayed?.(Math.min(Math.max(0, this.now() - startedAt), delayMs));
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
