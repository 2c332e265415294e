/**
 * Performance metric types
 * Produced by PerformanceTracker, consumed by report rendering and callers
 */

import type { ErrorClass, ErrorKind } from '../../../utils/retry/error-classifier.js';

/**
 * Metrics of one ended search task
 *
 * Frozen once the task ends.
 */
export interface SearchMetric {
  taskName: string;
  query: string;
  /** Epoch milliseconds */
  startTime: number;
  /** Wall time of the task, never less than delayTimeMs */
  durationMs: number;
  resultCount: number;
  retryCount: number;
  /** Retry back-off recorded while the task was open */
  delayTimeMs: number;
  errorClass?: ErrorClass;
  errorKind?: ErrorKind;
  success: boolean;
}

/**
 * Failure counts per error kind
 */
export type ErrorCounts = Partial<Record<ErrorKind, number>>;

/**
 * Aggregate metrics of one batch
 */
export interface BatchMetrics {
  /** Epoch milliseconds */
  startTime: number;
  /** Set by endBatch */
  endTime?: number;
  totalDurationMs: number;
  /** Task count given to startBatch */
  plannedSearches: number;
  /** Tasks attempted so far (ended) */
  totalSearches: number;
  successfulSearches: number;
  failedSearches: number;
  /** Sum of successful tasks' result counts */
  totalResults: number;
  retryCount: number;
  /** Retry back-off plus inter-task pauses */
  delayTimeMs: number;
  /** Mean of (durationMs - delayTimeMs) over successful tasks */
  averageResponseTimeMs: number;
  rateLimitHits: number;
  abuseDetections: number;
  serverErrors: number;
  /** Retried and final failures per kind */
  errorCounts: ErrorCounts;
}
