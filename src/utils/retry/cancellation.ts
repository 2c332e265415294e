/**
 * Cancellable waiting
 *
 * Every wait in the core races a timer against the caller's AbortSignal.
 * Whichever settles first wins; the loser is cleaned up.
 */

/**
 * Sleep function signature, injectable for tests
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Where an operation was stopped by its AbortSignal
 */
export type CancellationPhase =
  | 'before-attempt'
  | 'during-attempt'
  | 'retry-delay'
  | 'batch-delay';

const PHASE_MESSAGES: Record<CancellationPhase, string> = {
  'before-attempt': 'operation cancelled',
  'during-attempt': 'operation cancelled while running',
  'retry-delay': 'operation cancelled during retry delay',
  'batch-delay': 'operation cancelled during delay',
};

/**
 * Error raised when the caller asked the core to stop
 *
 * Never raised for exhausted retries or classification failures.
 */
export class OperationCancelledError extends Error {
  constructor(
    public readonly phase: CancellationPhase,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(`${PHASE_MESSAGES[phase]}: ${operation}`, options);
    this.name = 'OperationCancelledError';
  }
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error('The operation was aborted');
}

/**
 * Sleep for the given duration unless the signal aborts first
 *
 * @param ms - Milliseconds to sleep
 * @param signal - Optional abort signal
 * @returns Promise resolving after the delay, rejecting with the abort reason
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
