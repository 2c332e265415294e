/**
 * DelayScheduler
 *
 * Paces successive operations by their estimated complexity, to stay clear
 * of the remote API's secondary (abuse) rate limit.
 *
 * The pause is applied between operations, independent of and in addition
 * to any retry back-off.
 *
 * @example
 * ```typescript
 * const scheduler = new DelayScheduler({ delays: { high: 5000 } });
 *
 * await scheduler.wait('high', signal); // ~5s, unless the signal aborts
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { DEFAULT_COMPLEXITY_DELAYS } from '../../config/search-defaults.js';
import { MAX_TIMER_DELAY_MS } from '../../config/retry-policy.js';
import { OperationCancelledError, sleep as defaultSleep, type SleepFn } from '../retry/cancellation.js';
import type { OperationComplexity } from './complexity-estimator.js';

export interface DelaySchedulerOptions {
  /**
   * Delay per complexity class in milliseconds
   * Missing classes keep their default.
   * @default DEFAULT_COMPLEXITY_DELAYS
   */
  delays?: Partial<Record<OperationComplexity, number>>;

  /**
   * Optional name for logging purposes
   * @default 'DelayScheduler'
   */
  name?: string;

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

export interface DelaySchedulerStats {
  delays: Readonly<Record<OperationComplexity, number>>;
  /** Waits that actually slept */
  waitCount: number;
  /** Time spent in completed waits, in milliseconds */
  totalWaitedMs: number;
}

export class DelayScheduler {
  private readonly delays: Readonly<Record<OperationComplexity, number>>;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly logger: ServiceLogger;
  private waitCount = 0;
  private totalWaitedMs = 0;

  constructor(options: DelaySchedulerOptions = {}) {
    const overrides = options.delays ?? {};
    this.delays = Object.freeze({
      low: overrides.low ?? DEFAULT_COMPLEXITY_DELAYS.low,
      medium: overrides.medium ?? DEFAULT_COMPLEXITY_DELAYS.medium,
      high: overrides.high ?? DEFAULT_COMPLEXITY_DELAYS.high,
    });

    for (const [complexity, delayMs] of Object.entries(this.delays)) {
      if (!Number.isFinite(delayMs) || delayMs < 0 || delayMs > MAX_TIMER_DELAY_MS) {
        throw new RangeError(
          `Delay for ${complexity} complexity must be between 0 and ${MAX_TIMER_DELAY_MS}, got ${delayMs}`
        );
      }
    }

    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => Date.now());
    this.logger = createServiceLogger(options.name ?? 'DelayScheduler');
    this.logger.debug({ delays: this.delays }, 'DelayScheduler initialized');
  }

  /**
   * Pause to insert after an operation of the given complexity
   */
  delayFor(complexity: OperationComplexity): number {
    return this.delays[complexity];
  }

  /**
   * Wait the complexity's delay, unless the signal aborts first
   *
   * A zero delay resolves immediately without touching the timer.
   *
   * @param onDelayed - Receives the time actually waited, also when the wait is cancelled
   * @throws OperationCancelledError ('batch-delay') if the signal aborts
   */
  async wait(
    complexity: OperationComplexity,
    signal?: AbortSignal,
    onDelayed?: (elapsedMs: number) => void
  ): Promise<void> {
    const delayMs = this.delayFor(complexity);
    if (delayMs <= 0) {
      return;
    }

    log.delayScheduled(this.logger, complexity, delayMs);

    const startedAt = this.now();
    const elapsed = () => Math.min(Math.max(0, this.now() - startedAt), delayMs);

    try {
      await this.sleep(delayMs, signal);
    } catch (error) {
      onDelayed?.(elapsed());
      if (signal?.aborted) {
        throw new OperationCancelledError('batch-delay', `${complexity} complexity delay`, {
          cause: error,
        });
      }
      throw error;
    }

    const waitedMs = elapsed();
    this.waitCount++;
    this.totalWaitedMs += waitedMs;
    onDelayed?.(waitedMs);
  }

  getStats(): DelaySchedulerStats {
    return {
      delays: this.delays,
      waitCount: this.waitCount,
      totalWaitedMs: this.totalWaitedMs,
    };
  }
}
