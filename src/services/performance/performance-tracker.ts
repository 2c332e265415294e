/**
 * PerformanceTracker
 *
 * Records per-search and per-batch timing, retries, delays, result counts
 * and error kinds, and renders them as a report.
 *
 * Lifecycle:
 * - startBatch(n) resets the tracker for a batch of n planned searches
 * - startSearch / endSearch bracket each search; one may be open at a time
 * - recordRetry / recordDelay accumulate into the open search (if any) and the batch
 * - endBatch finalizes totals and freezes the tracker
 *
 * A tracker is owned by one batch run; it is not shared across runs.
 */

import { createServiceLogger } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { DEFAULT_RETRY_POLICY } from '../../config/retry-policy.js';
import { ErrorClassifier, type ErrorKind } from '../../utils/retry/error-classifier.js';
import type { BatchMetrics, SearchMetric } from '../types/performance/index.js';
import { formatPerformanceReport, formatSearchBreakdown } from './performance-report.js';

export interface PerformanceTrackerDependencies {
  /**
   * Classifier used to attribute failures to error kinds
   * If not provided, one is created for DEFAULT_RETRY_POLICY
   */
  classifier?: ErrorClassifier;

  /**
   * Clock returning epoch milliseconds
   * @default Date.now
   */
  now?: () => number;
}

/**
 * Error thrown when tracker calls arrive out of order
 */
export class PerformanceTrackerStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PerformanceTrackerStateError';
  }
}

interface OpenSearch {
  taskName: string;
  query: string;
  startTime: number;
  retryCount: number;
  delayTimeMs: number;
}

export class PerformanceTracker {
  private readonly classifier: ErrorClassifier;
  private readonly now: () => number;
  private readonly logger: ServiceLogger;

  private metrics: BatchMetrics;
  private searches: SearchMetric[] = [];
  private current: OpenSearch | null = null;
  private finished = false;

  constructor(dependencies: PerformanceTrackerDependencies = {}) {
    this.classifier = dependencies.classifier ?? new ErrorClassifier(DEFAULT_RETRY_POLICY);
    this.now = dependencies.now ?? (() => Date.now());
    this.logger = createServiceLogger('PerformanceTracker');
    this.metrics = this.emptyMetrics(0);
  }

  /**
   * Begin tracking a batch of the given number of searches
   */
  startBatch(plannedSearches: number): void {
    if (this.ignoredAfterEnd('startBatch')) return;

    this.metrics = this.emptyMetrics(plannedSearches);
    this.searches = [];
    this.current = null;
  }

  /**
   * Begin tracking one search
   *
   * @throws PerformanceTrackerStateError if another search is still open
   */
  startSearch(taskName: string, query: string): void {
    if (this.ignoredAfterEnd('startSearch')) return;

    if (this.current) {
      throw new PerformanceTrackerStateError(
        `Cannot start search '${taskName}': search '${this.current.taskName}' is still open`
      );
    }

    this.current = {
      taskName,
      query,
      startTime: this.now(),
      retryCount: 0,
      delayTimeMs: 0,
    };
  }

  /**
   * Count one scheduled retry
   *
   * @param kind - Kind of the failure being retried, counted per kind when given
   */
  recordRetry(kind?: ErrorKind): void {
    if (this.ignoredAfterEnd('recordRetry')) return;

    if (this.current) {
      this.current.retryCount++;
    }
    this.metrics.retryCount++;

    if (kind !== undefined) {
      this.countErrorKind(kind);
    }
  }

  /**
   * Add delay time to the open search (if any) and to the batch
   *
   * Callers report time actually spent waiting, after the wait ends.
   */
  recordDelay(delayMs: number): void {
    if (this.ignoredAfterEnd('recordDelay')) return;

    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new RangeError(`Delay must be a non-negative number of milliseconds, got ${delayMs}`);
    }

    if (this.current) {
      this.current.delayTimeMs += delayMs;
    }
    this.metrics.delayTimeMs += delayMs;
  }

  /**
   * Close the open search
   *
   * Does nothing when no search is open.
   *
   * @param resultCount - Results returned by the search
   * @param error - Failure that ended the search, if it failed
   */
  endSearch(resultCount: number, error?: unknown): void {
    if (this.ignoredAfterEnd('endSearch')) return;

    const open = this.current;
    if (!open) {
      this.logger.debug('endSearch called without an open search');
      return;
    }
    this.current = null;

    const elapsed = Math.max(0, this.now() - open.startTime);
    const metric: SearchMetric = {
      taskName: open.taskName,
      query: open.query,
      startTime: open.startTime,
      durationMs: elapsed,
      resultCount,
      retryCount: open.retryCount,
      delayTimeMs: open.delayTimeMs,
      success: error === undefined,
    };

    this.metrics.totalSearches++;

    if (error === undefined) {
      this.metrics.successfulSearches++;
      this.metrics.totalResults += resultCount;
    } else {
      const classification = this.classifier.classify(error, 0);
      metric.errorClass = classification.errorClass;
      metric.errorKind = classification.kind;
      this.metrics.failedSearches++;
      this.countErrorKind(classification.kind);
    }

    this.searches.push(Object.freeze(metric));
  }

  /**
   * Finalize the batch totals and freeze the tracker
   *
   * Later calls are no-ops.
   */
  endBatch(): void {
    if (this.finished) return;

    if (this.current) {
      this.logger.warn(
        { taskName: this.current.taskName },
        'Ending batch with an open search; it is not counted'
      );
      this.current = null;
    }

    const endTime = this.now();
    this.metrics.endTime = endTime;
    this.metrics.totalDurationMs = Math.max(0, endTime - this.metrics.startTime);

    if (this.metrics.successfulSearches > 0) {
      const responseTime = this.searches
        .filter((search) => search.success)
        .reduce((sum, search) => sum + (search.durationMs - search.delayTimeMs), 0);
      this.metrics.averageResponseTimeMs = responseTime / this.metrics.successfulSearches;
    }

    this.finished = true;
    this.logger.info(
      {
        totalSearches: this.metrics.totalSearches,
        successfulSearches: this.metrics.successfulSearches,
        failedSearches: this.metrics.failedSearches,
        totalDurationMs: this.metrics.totalDurationMs,
      },
      'Batch tracking finished'
    );
  }

  isFinished(): boolean {
    return this.finished;
  }

  /**
   * Snapshot of the batch metrics
   */
  getMetrics(): Readonly<BatchMetrics> {
    return Object.freeze({
      ...this.metrics,
      errorCounts: Object.freeze({ ...this.metrics.errorCounts }),
    });
  }

  /**
   * Metrics of every ended search, in order
   */
  getSearchMetrics(): readonly SearchMetric[] {
    return [...this.searches];
  }

  /**
   * Summary report over the current metrics
   */
  generateReport(): string {
    return formatPerformanceReport(this.metrics);
  }

  /**
   * Summary report followed by a per-search breakdown
   */
  generateDetailedReport(): string {
    const report = this.generateReport();
    if (this.searches.length === 0) {
      return report;
    }
    return `${report}\n\n${formatSearchBreakdown(this.searches)}`;
  }

  private countErrorKind(kind: ErrorKind): void {
    this.metrics.errorCounts[kind] = (this.metrics.errorCounts[kind] ?? 0) + 1;

    switch (kind) {
      case 'rate_limit':
        this.metrics.rateLimitHits++;
        break;
      case 'abuse_detection':
        this.metrics.abuseDetections++;
        break;
      case 'server_error':
        this.metrics.serverErrors++;
        break;
      default:
        break;
    }
  }

  private ignoredAfterEnd(method: string): boolean {
    if (this.finished) {
      this.logger.warn({ method }, 'Tracker already finished, ignoring call');
    }
    return this.finished;
  }

  private emptyMetrics(plannedSearches: number): BatchMetrics {
    return {
      startTime: this.now(),
      totalDurationMs: 0,
      plannedSearches,
      totalSearches: 0,
      successfulSearches: 0,
      failedSearches: 0,
      totalResults: 0,
      retryCount: 0,
      delayTimeMs: 0,
      averageResponseTimeMs: 0,
      rateLimitHits: 0,
      abuseDetections: 0,
      serverErrors: 0,
      errorCounts: {},
    };
  }
}
