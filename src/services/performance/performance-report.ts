/**
 * Performance report rendering
 *
 * Pure functions over tracked metrics. The thresholds below only drive
 * descriptive insight lines.
 */

import type { BatchMetrics, SearchMetric } from '../types/performance/index.js';

const SLOW_RESPONSE_MS = 2_000;
const SLOW_FOR_SMALL_PAGES_MS = 1_000;
const SMALL_PAGE_RESULTS = 10;
const LOW_SUCCESS_RATE_PERCENT = 90;

/**
 * Human-readable duration
 *
 * @example
 * ```typescript
 * formatDuration(850);     // '850ms'
 * formatDuration(12_340);  // '12.3s'
 * formatDuration(125_000); // '2m 5s'
 * ```
 */
export function formatDuration(ms: number): string {
  const rounded = Math.max(0, Math.round(ms));
  if (rounded < 1_000) {
    return `${rounded}ms`;
  }
  if (rounded < 60_000) {
    return `${(rounded / 1_000).toFixed(1)}s`;
  }
  const minutes = Math.floor(rounded / 60_000);
  const seconds = Math.floor((rounded % 60_000) / 1_000);
  return `${minutes}m ${seconds}s`;
}

function percent(part: number, total: number): string {
  if (total === 0) {
    return '0.0%';
  }
  return `${((part / total) * 100).toFixed(1)}%`;
}

function resultsPerSearch(metrics: BatchMetrics): number {
  return metrics.totalResults / Math.max(metrics.successfulSearches, 1);
}

/**
 * Observations on how the batch went
 */
export function performanceInsights(metrics: BatchMetrics): string[] {
  const insights: string[] = [];

  if (metrics.averageResponseTimeMs > SLOW_RESPONSE_MS) {
    insights.push('Slow responses: consider smaller batches or page sizes');
  } else {
    insights.push('Response times look healthy');
  }

  if (metrics.rateLimitHits > 0) {
    insights.push(`Hit the rate limit ${metrics.rateLimitHits} time(s): add delays between searches`);
  }

  if (metrics.abuseDetections > 0) {
    insights.push(
      `Triggered abuse detection ${metrics.abuseDetections} time(s): reduce request frequency`
    );
  }

  if (metrics.retryCount > metrics.totalSearches) {
    insights.push('High retry rate: check the network connection and the API status');
  }

  if (metrics.totalSearches > 0) {
    const successRate = (metrics.successfulSearches / metrics.totalSearches) * 100;
    insights.push(
      successRate < LOW_SUCCESS_RATE_PERCENT
        ? 'Low success rate: investigate common failure patterns'
        : 'High success rate'
    );
  }

  return insights;
}

/**
 * Suggested changes for the next run
 */
export function performanceRecommendations(metrics: BatchMetrics): string[] {
  const recommendations: string[] = [];

  if (metrics.totalDurationMs > 0 && metrics.delayTimeMs > metrics.totalDurationMs / 2) {
    recommendations.push('Delays account for most of the run time: tune the complexity delays');
  }

  if (metrics.rateLimitHits > 0 || metrics.abuseDetections > 0) {
    recommendations.push('Use longer delays between searches');
    recommendations.push('Narrow queries with filters to reduce API load');
  }

  if (
    metrics.averageResponseTimeMs > SLOW_FOR_SMALL_PAGES_MS &&
    resultsPerSearch(metrics) < SMALL_PAGE_RESULTS
  ) {
    recommendations.push('Raise maxResults to fetch more data per request');
  }

  return recommendations;
}

function bullets(lines: string[]): string[] {
  return lines.map((line) => `  - ${line}`);
}

/**
 * Summary report of a batch
 */
export function formatPerformanceReport(metrics: BatchMetrics): string {
  const recommendations = performanceRecommendations(metrics);

  return [
    'Batch Performance Report',
    '',
    'Timing:',
    `  Total duration: ${formatDuration(metrics.totalDurationMs)}`,
    `  Average response time: ${formatDuration(metrics.averageResponseTimeMs)}`,
    `  Total delay time: ${formatDuration(metrics.delayTimeMs)}`,
    `  Actual work time: ${formatDuration(metrics.totalDurationMs - metrics.delayTimeMs)}`,
    '',
    'Results:',
    `  Searches: ${metrics.totalSearches} of ${metrics.plannedSearches} attempted`,
    `  Successful: ${metrics.successfulSearches} (${percent(metrics.successfulSearches, metrics.totalSearches)})`,
    `  Failed: ${metrics.failedSearches} (${percent(metrics.failedSearches, metrics.totalSearches)})`,
    `  Total results: ${metrics.totalResults}`,
    `  Results per search: ${resultsPerSearch(metrics).toFixed(1)}`,
    '',
    'Reliability:',
    `  Retries: ${metrics.retryCount}`,
    `  Rate limit hits: ${metrics.rateLimitHits}`,
    `  Abuse detections: ${metrics.abuseDetections}`,
    `  Server errors: ${metrics.serverErrors}`,
    '',
    'Insights:',
    ...bullets(performanceInsights(metrics)),
    '',
    'Recommendations:',
    ...bullets(recommendations.length > 0 ? recommendations : ['No changes needed']),
  ].join('\n');
}

/**
 * Per-search breakdown appended to the detailed report
 */
export function formatSearchBreakdown(searches: readonly SearchMetric[]): string {
  const lines = ['Searches:'];

  searches.forEach((search, index) => {
    const status = search.success ? 'ok' : 'failed';
    const details = [
      `duration ${formatDuration(search.durationMs)}`,
      `results ${search.resultCount}`,
    ];
    if (search.retryCount > 0) {
      details.push(`retries ${search.retryCount}`);
    }
    if (search.delayTimeMs > 0) {
      details.push(`delay ${formatDuration(search.delayTimeMs)}`);
    }
    if (!search.success) {
      details.push(`error ${search.errorKind ?? 'unknown'}`);
    }

    lines.push(`  ${index + 1}. [${status}] ${search.taskName}`);
    lines.push(`     ${details.join(' | ')}`);
  });

  return lines.join('\n');
}
