/**
 * Unit tests for RetryExecutor
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { RetryExecutor } from './retry-executor.js';
import { OperationCancelledError, type SleepFn } from './cancellation.js';
import { NonRetryableError, RetryExhaustedError } from './errors.js';
import { createRetryPolicy, type RetryPolicy } from '../../config/retry-policy.js';
import {
  AbuseRateLimitError,
  RateLimitError,
  ValidationError,
} from '../../clients/search/errors.js';

describe('RetryExecutor', () => {
  let sleepMock: Mock<SleepFn>;

  beforeEach(() => {
    sleepMock = vi.fn<SleepFn>().mockResolvedValue(undefined);
  });

  function createExecutor(overrides: Partial<RetryPolicy> = {}) {
    return new RetryExecutor({
      policy: createRetryPolicy({ maxRetries: 2, baseDelayMs: 10, backoffFactor: 2, ...overrides }),
      sleep: sleepMock,
    });
  }

  // ============================================================================
  // Success
  // ============================================================================

  describe('success', () => {
    it('should return the first successful result without sleeping', async () => {
      const executor = createExecutor();
      const operation = vi.fn().mockResolvedValue(42);

      await expect(executor.withRetry('op', operation)).resolves.toBe(42);

      expect(operation).toHaveBeenCalledTimes(1);
      expect(sleepMock).not.toHaveBeenCalled();
    });

    it('should retry rate limits and succeed on the third attempt', async () => {
      const executor = createExecutor();
      const onRetry = vi.fn();
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new RateLimitError('API rate limit exceeded'))
        .mockRejectedValueOnce(new RateLimitError('API rate limit exceeded'))
        .mockResolvedValueOnce('found');

      const result = await executor.withRetry('op', operation, { onRetry });

      expect(result).toBe('found');
      expect(operation).toHaveBeenCalledTimes(3);
      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(sleepMock.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
    });

    it('should pass attempt details to onRetry', async () => {
      const executor = createExecutor();
      const onRetry = vi.fn();
      const failure = new AbuseRateLimitError('slow down', 5_000);
      const operation = vi.fn().mockRejectedValueOnce(failure).mockResolvedValueOnce('ok');

      await executor.withRetry('op', operation, { onRetry });

      expect(onRetry).toHaveBeenCalledWith({
        attempt: 0,
        delayMs: 5_000,
        classification: {
          errorClass: 'abuse_detection',
          kind: 'abuse_detection',
          retryable: true,
          delayMs: 5_000,
        },
        error: failure,
      });
    });

    it('should use the gentler multiplier for timeouts', async () => {
      const executor = createExecutor({ baseDelayMs: 100 });
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new Error('request timeout'))
        .mockRejectedValueOnce(new Error('request timeout'))
        .mockResolvedValueOnce('ok');

      await executor.withRetry('op', operation);

      expect(sleepMock.mock.calls.map(([ms]) => ms)).toEqual([100, 150]);
    });

    it('should not sleep for a zero delay', async () => {
      const executor = createExecutor();
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new RateLimitError('limit', { resetMs: 0 }))
        .mockResolvedValueOnce('ok');

      await executor.withRetry('op', operation);

      expect(operation).toHaveBeenCalledTimes(2);
      expect(sleepMock).not.toHaveBeenCalled();
    });
  });

  // ============================================================================
  // Failure
  // ============================================================================

  describe('failure', () => {
    it.each([0, 1, 3])(
      'should invoke an always-failing operation exactly maxRetries + 1 times (maxRetries=%i)',
      async (maxRetries) => {
        const executor = createExecutor({ maxRetries });
        const operation = vi.fn().mockRejectedValue(new Error('502 bad gateway'));

        await expect(executor.withRetry('op', operation)).rejects.toBeInstanceOf(
          RetryExhaustedError
        );

        expect(operation).toHaveBeenCalledTimes(maxRetries + 1);
        expect(sleepMock).toHaveBeenCalledTimes(maxRetries);
      }
    );

    it('should format exhausted server errors with guidance', async () => {
      const executor = createExecutor({ maxRetries: 1 });
      const operation = vi.fn().mockRejectedValue(new Error('502 bad gateway'));

      const error = await executor.withRetry("batch search 'configs'", operation).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error).toMatchObject({
        retryCount: 1,
        operation: "batch search 'configs'",
        classification: { errorClass: 'server_error' },
      });
      expect(String(error)).toContain(
        "search API server error during batch search 'configs' after 1 retries: 502 bad gateway"
      );
    });

    it('should format exhausted rate limits with rate limit guidance', async () => {
      const executor = createExecutor({ maxRetries: 0 });
      const cause = new RateLimitError('API rate limit exceeded');

      const error = await executor
        .withRetry('op', () => Promise.reject(cause))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error).toMatchObject({ cause });
      expect(String(error)).toContain(
        'rate limit exceeded during op after 0 retries: API rate limit exceeded'
      );
      expect(String(error)).toContain('Wait until your rate limit resets');
    });

    it('should format exhausted abuse detection with abuse guidance', async () => {
      const executor = createExecutor({ maxRetries: 0 });

      await expect(
        executor.withRetry('op', () => Promise.reject(new AbuseRateLimitError('slow down')))
      ).rejects.toThrow('abuse detection triggered during op after 0 retries: slow down');
    });

    it('should use the generic format for other exhausted classes', async () => {
      const executor = createExecutor({ maxRetries: 1 });

      await expect(
        executor.withRetry('op', () => Promise.reject(new Error('connection reset by peer')))
      ).rejects.toThrow('operation op failed after 1 retries: connection reset by peer');
    });

    it('should fail immediately on non-retryable errors', async () => {
      const executor = createExecutor();
      const cause = new ValidationError('Validation Failed', ['bad qualifier']);
      const operation = vi.fn().mockRejectedValue(cause);
      const onRetry = vi.fn();

      const error = await executor.withRetry('op', operation, { onRetry }).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(NonRetryableError);
      expect(error).toMatchObject({
        message: 'non-retryable error in op: Validation Failed: bad qualifier',
        cause,
        classification: { kind: 'validation' },
      });
      expect(operation).toHaveBeenCalledTimes(1);
      expect(onRetry).not.toHaveBeenCalled();
      expect(sleepMock).not.toHaveBeenCalled();
    });

    it('should handle synchronous throws from the operation', async () => {
      const executor = createExecutor();

      await expect(
        executor.withRetry('op', () => {
          throw new Error('unexpected');
        })
      ).rejects.toThrow('non-retryable error in op: unexpected');
    });
  });

  // ============================================================================
  // Cancellation
  // ============================================================================

  describe('cancellation', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should not start an attempt when already cancelled', async () => {
      const executor = createExecutor();
      const controller = new AbortController();
      controller.abort();
      const operation = vi.fn();

      const error = await executor
        .withRetry('op', operation, { signal: controller.signal })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(error).toMatchObject({ phase: 'before-attempt', message: 'operation cancelled: op' });
      expect(operation).not.toHaveBeenCalled();
    });

    it('should abort promptly during a retry delay', async () => {
      vi.useFakeTimers();
      const executor = new RetryExecutor({
        policy: createRetryPolicy({ maxRetries: 3, baseDelayMs: 10_000 }),
      });
      const controller = new AbortController();
      const operation = vi.fn().mockRejectedValue(new Error('service unavailable'));
      const onDelayed = vi.fn();

      const promise = executor.withRetry('op', operation, {
        signal: controller.signal,
        onDelayed,
      });
      const assertion = expect(promise).rejects.toMatchObject({
        name: 'OperationCancelledError',
        phase: 'retry-delay',
      });

      await vi.advanceTimersByTimeAsync(100);
      controller.abort();

      await assertion;
      expect(operation).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
      expect(onDelayed).toHaveBeenCalledTimes(1);
      expect(onDelayed).toHaveBeenCalledWith(100);
    });

    it('should report the full delay once a retry delay completes', async () => {
      vi.useFakeTimers();
      const executor = new RetryExecutor({
        policy: createRetryPolicy({ maxRetries: 2, baseDelayMs: 250 }),
      });
      const onDelayed = vi.fn();
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new Error('502 bad gateway'))
        .mockResolvedValueOnce('ok');

      const promise = executor.withRetry('op', operation, { onDelayed });
      await vi.advanceTimersByTimeAsync(250);

      await expect(promise).resolves.toBe('ok');
      expect(onDelayed.mock.calls).toEqual([[250]]);
    });

    it('should report cancellation when the operation fails after an abort', async () => {
      const executor = createExecutor();
      const controller = new AbortController();
      const operation = vi.fn().mockImplementation(async () => {
        controller.abort();
        throw new Error('This operation was aborted');
      });

      await expect(
        executor.withRetry('op', operation, { signal: controller.signal })
      ).rejects.toMatchObject({ phase: 'during-attempt' });
    });

    it('should propagate nested cancellations unchanged', async () => {
      const executor = createExecutor();
      const nested = new OperationCancelledError('batch-delay', 'inner');

      await expect(executor.withRetry('op', () => Promise.reject(nested))).rejects.toBe(nested);
    });
  });
});
