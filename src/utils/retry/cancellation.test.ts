/**
 * Tests for cancellable sleep
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OperationCancelledError, sleep, type CancellationPhase } from './cancellation.js';

describe('sleep()', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the delay', async () => {
    const done = vi.fn();
    const promise = sleep(1000).then(done);

    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await promise;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('should resolve with a signal that never aborts', async () => {
    const controller = new AbortController();
    const promise = sleep(500, controller.signal);

    await vi.advanceTimersByTimeAsync(500);
    await expect(promise).resolves.toBeUndefined();
  });

  it('should reject immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await expect(sleep(60_000, controller.signal)).rejects.toThrow('stop');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should reject as soon as the signal aborts and clear the timer', async () => {
    const controller = new AbortController();
    const promise = sleep(60_000, controller.signal);
    const assertion = expect(promise).rejects.toThrow('deadline reached');

    await vi.advanceTimersByTimeAsync(100);
    controller.abort(new Error('deadline reached'));

    await assertion;
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should fall back to a generic error for non-Error abort reasons', async () => {
    const controller = new AbortController();
    controller.abort('nope');

    await expect(sleep(10, controller.signal)).rejects.toThrow('The operation was aborted');
  });
});

describe('OperationCancelledError', () => {
  const cases: Array<[CancellationPhase, string]> = [
    ['before-attempt', 'operation cancelled: search'],
    ['during-attempt', 'operation cancelled while running: search'],
    ['retry-delay', 'operation cancelled during retry delay: search'],
    ['batch-delay', 'operation cancelled during delay: search'],
  ];

  it.each(cases)('should format the %s phase', (phase, message) => {
    const error = new OperationCancelledError(phase, 'search');

    expect(error.message).toBe(message);
    expect(error.phase).toBe(phase);
    expect(error.name).toBe('OperationCancelledError');
  });
});
