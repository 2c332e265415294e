/**
 * BatchExecutor
 *
 * Runs the searches of a batch one after another through the retry engine,
 * pausing between them by complexity, and aggregates their results.
 *
 * Searches run strictly in sequence so that a batch never multiplies load
 * against the account-wide secondary rate limit. The first search that
 * fails for good stops the batch; later searches are not attempted.
 *
 * @example
 * ```typescript
 * const executor = new BatchExecutor({
 *   searchClient,
 *   retryExecutor: new RetryExecutor({ policy: getRetryPolicyFromEnv() }),
 * });
 *
 * const { result, report } = await executor.run(tasks, {
 *   name: 'Frontend configs',
 *   compare: true,
 *   report: 'detailed',
 *   signal: AbortSignal.timeout(10 * 60_000),
 * });
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { SearchClient, SearchOutcome, SearchTask } from '../../clients/search/types.js';
import { RetryExecutor, type RetryAttempt } from '../../utils/retry/retry-executor.js';
import { OperationCancelledError } from '../../utils/retry/cancellation.js';
import { DelayScheduler } from '../../utils/request-scheduler/delay-scheduler.js';
import { estimateTaskComplexity } from '../../utils/request-scheduler/complexity-estimator.js';
import {
  PerformanceTracker,
  PerformanceTrackerStateError,
} from '../performance/performance-tracker.js';
import type {
  BatchReportMode,
  BatchResult,
  BatchRunOptions,
  BatchRunOutput,
  BatchSearchResult,
} from '../types/batch/index.js';
import { generateComparisons } from './batch-comparison.js';
import { BatchCancelledError, BatchSearchFailedError } from './errors.js';

export interface BatchExecutorDependencies {
  /**
   * Executes one remote search per call
   */
  searchClient: SearchClient;

  /**
   * Retry engine applied to every search
   */
  retryExecutor: RetryExecutor;

  /**
   * Pacing between searches
   * If not provided, a DelayScheduler with the default delays is created
   */
  delayScheduler?: DelayScheduler;

  /**
   * Tracker for a single run
   * If not provided, a fresh tracker is created for every run
   */
  tracker?: PerformanceTracker;
}

export class BatchExecutor {
  private readonly searchClient: SearchClient;
  private readonly retryExecutor: RetryExecutor;
  private readonly delayScheduler: DelayScheduler;
  private readonly tracker: PerformanceTracker | undefined;
  private readonly logger: ServiceLogger;

  constructor(dependencies: BatchExecutorDependencies) {
    this.searchClient = dependencies.searchClient;
    this.retryExecutor = dependencies.retryExecutor;
    this.delayScheduler = dependencies.delayScheduler ?? new DelayScheduler();
    this.tracker = dependencies.tracker;
    this.logger = createServiceLogger('BatchExecutor');
  }

  /**
   * Run a batch of searches
   *
   * @param tasks - Searches in execution order
   * @param options - Batch naming, comparison, report and cancellation options
   * @returns Aggregated result, the requested report and the final metrics
   * @throws BatchSearchFailedError naming the first search that failed
   * @throws BatchCancelledError if the signal aborts
   *
   * Both errors carry the metrics and the requested report of the searches
   * that ran before the batch stopped.
   */
  async run(
    tasks: readonly SearchTask[],
    options: BatchRunOptions = {}
  ): Promise<BatchRunOutput> {
    const { signal, compare = false, report = 'none' } = options;
    const tracker = this.trackerForRun();

    log.methodEntry(this.logger, 'run', { name: options.name, searches: tasks.length, compare });

    const result: BatchResult = {
      name: options.name ?? '',
      description: options.description ?? '',
      searchCount: tasks.length,
      totalResults: 0,
      results: [],
    };

    tracker.startBatch(tasks.length);

    for (const [index, task] of tasks.entries()) {
      this.logger.info(
        { search: task.name, position: index + 1, total: tasks.length },
        'Executing batch search'
      );

      const outcome = await this.executeSearch(task, index, tracker, signal, report);
      result.results.push(toSearchResult(task, outcome));
      result.totalResults += outcome.resultCount;

      this.logger.info(
        { search: task.name, resultCount: outcome.resultCount },
        'Batch search completed'
      );

      if (index < tasks.length - 1) {
        await this.pauseAfter(task, tracker, signal, report);
      }
    }

    if (compare && result.results.length > 1) {
      result.comparisons = generateComparisons(result.results, tasks);
    }

    tracker.endBatch();

    const output: BatchRunOutput = { result, metrics: tracker.getMetrics() };
    const rendered = renderReport(tracker, report);
    if (rendered !== undefined) {
      output.report = rendered;
    }

    log.methodExit(this.logger, 'run', {
      searches: result.results.length,
      totalResults: result.totalResults,
    });
    return output;
  }

  private trackerForRun(): PerformanceTracker {
    if (!this.tracker) {
      return new PerformanceTracker({ classifier: this.retryExecutor.getClassifier() });
    }
    if (this.tracker.isFinished()) {
      throw new PerformanceTrackerStateError(
        'The injected tracker already finished a batch; provide a fresh tracker per run'
      );
    }
    return this.tracker;
  }

  private async executeSearch(
    task: SearchTask,
    index: number,
    tracker: PerformanceTracker,
    signal: AbortSignal | undefined,
    report: BatchReportMode
  ): Promise<SearchOutcome> {
    tracker.startSearch(task.name, task.query);

    try {
      const outcome = await this.retryExecutor.withRetry(
        `batch search '${task.name}'`,
        () => this.searchOnce(task, signal),
        {
          signal,
          onRetry: (retry: RetryAttempt) => {
            tracker.recordRetry(retry.classification.kind);
          },
          onDelayed: (elapsedMs) => {
            tracker.recordDelay(elapsedMs);
          },
        }
      );
      tracker.endSearch(outcome.resultCount);
      return outcome;
    } catch (error) {
      tracker.endSearch(0, error);
      throw this.stopBatch(tracker, report, error, { task, index });
    }
  }

  /**
   * Finish the tracker and turn the error that stopped the batch into the
   * one `run` throws
   */
  private stopBatch(
    tracker: PerformanceTracker,
    mode: BatchReportMode,
    error: unknown,
    failed?: { task: SearchTask; index: number }
  ): unknown {
    tracker.endBatch();
    const metrics = tracker.getMetrics();
    const report = renderReport(tracker, mode);

    if (error instanceof OperationCancelledError) {
      this.logger.warn(
        { search: failed?.task.name, phase: error.phase, completed: metrics.successfulSearches },
        'Batch cancelled'
      );
      return new BatchCancelledError(error, metrics, report);
    }

    if (!failed) {
      if (error instanceof Error) {
        log.methodError(this.logger, 'run', error);
      }
      return error;
    }

    const failure = new BatchSearchFailedError(failed.task.name, failed.index, error, metrics, report);
    log.methodError(this.logger, 'run', failure, {
      search: failed.task.name,
      position: failed.index + 1,
    });
    return failure;
  }

  private async searchOnce(task: SearchTask, signal: AbortSignal | undefined): Promise<SearchOutcome> {
    const outcome = await this.searchClient.search(task, signal);
    if (outcome.error) {
      throw outcome.error;
    }
    return outcome;
  }

  /**
   * Pause after a search before the next one, sized by its complexity
   */
  private async pauseAfter(
    task: SearchTask,
    tracker: PerformanceTracker,
    signal: AbortSignal | undefined,
    report: BatchReportMode
  ): Promise<void> {
    const complexity = estimateTaskComplexity(task);

    try {
      await this.delayScheduler.wait(complexity, signal, (elapsedMs) => {
        tracker.recordDelay(elapsedMs);
      });
    } catch (error) {
      throw this.stopBatch(tracker, report, error);
    }
  }
}

function toSearchResult(task: SearchTask, outcome: SearchOutcome): BatchSearchResult {
  const result: BatchSearchResult = {
    name: task.name,
    query: task.query,
    tags: task.tags ? [...task.tags] : [],
    resultCount: outcome.resultCount,
  };
  if (outcome.totalCount !== undefined) {
    result.totalCount = outcome.totalCount;
  }
  if (outcome.incompleteResults !== undefined) {
    result.incompleteResults = outcome.incompleteResults;
  }
  return result;
}

function renderReport(tracker: PerformanceTracker, mode: BatchReportMode): string | undefined {
  switch (mode) {
    case 'summary':
      return tracker.generateReport();
    case 'detailed':
      return tracker.generateDetailedReport();
    case 'none':
      return undefined;
  }
}
