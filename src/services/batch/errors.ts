/**
 * Batch errors
 */

import { OperationFailureError } from '../../utils/retry/errors.js';
import { OperationCancelledError } from '../../utils/retry/cancellation.js';
import type { BatchMetrics } from '../types/performance/index.js';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A batch stopped because one of its searches failed
 *
 * The remaining searches were not attempted. `metrics` and `report` cover
 * the searches that ran, the failed one included.
 */
export class BatchSearchFailedError extends OperationFailureError {
  constructor(
    public readonly taskName: string,
    /** Zero-based position of the failed search */
    public readonly taskIndex: number,
    cause: unknown,
    public readonly metrics: Readonly<BatchMetrics>,
    /** Rendered in the run's report mode; absent for 'none' */
    public readonly report?: string
  ) {
    super(
      `failed to execute search '${taskName}': ${messageOf(cause)}`,
      `batch search '${taskName}'`,
      cause
    );
    this.name = 'BatchSearchFailedError';
  }
}

/**
 * A batch stopped by its AbortSignal
 *
 * Keeps the phase and operation of the cancellation it wraps, and adds the
 * metrics and report of the searches that ran before it.
 */
export class BatchCancelledError extends OperationCancelledError {
  constructor(
    cancellation: OperationCancelledError,
    public readonly metrics: Readonly<BatchMetrics>,
    public readonly report?: string
  ) {
    super(cancellation.phase, cancellation.operation, { cause: cancellation });
    this.name = 'BatchCancelledError';
  }
}

/**
 * A batch definition is incomplete or out of range
 */
export class BatchDefinitionError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Invalid batch definition: ${errors.join('; ')}`);
    this.name = 'BatchDefinitionError';
  }
}
