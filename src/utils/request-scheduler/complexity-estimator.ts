/**
 * Complexity estimation
 *
 * Coarse score of how much server-side work a search is expected to cost.
 * The score is monotonic: more terms, wildcards, results or filters never
 * lower the class.
 */

import { hasFilters, type SearchTask } from '../../clients/search/types.js';

export type OperationComplexity = 'low' | 'medium' | 'high';

const MANY_TERMS_THRESHOLD = 3;
const LARGE_PAGE_SIZE = 100;
const MEDIUM_PAGE_SIZE = 50;
const HIGH_SCORE = 4;
const MEDIUM_SCORE = 2;

const WILDCARD_PATTERN = /[*?]/;

/**
 * Estimate the complexity of a search from its shape
 *
 * @param query - Raw query text
 * @param maxResults - Requested page size
 * @param filtered - Whether cost-relevant filters are set
 *
 * @example
 * ```typescript
 * estimateComplexity('config', 10, false);          // 'low'
 * estimateComplexity('next.config.*', 80, false);   // 'medium'
 * estimateComplexity('a b c d *', 200, true);       // 'high'
 * ```
 */
export function estimateComplexity(
  query: string,
  maxResults: number,
  filtered: boolean
): OperationComplexity {
  let score = 0;

  const terms = query.trim().split(/\s+/).filter((term) => term !== '');
  if (terms.length > MANY_TERMS_THRESHOLD) {
    score += 1;
  }

  if (WILDCARD_PATTERN.test(query)) {
    score += 1;
  }

  if (maxResults > LARGE_PAGE_SIZE) {
    score += 2;
  } else if (maxResults > MEDIUM_PAGE_SIZE) {
    score += 1;
  }

  if (filtered) {
    score += 1;
  }

  if (score >= HIGH_SCORE) return 'high';
  if (score >= MEDIUM_SCORE) return 'medium';
  return 'low';
}

/**
 * Estimate the complexity of a batch search task
 */
export function estimateTaskComplexity(task: SearchTask): OperationComplexity {
  return estimateComplexity(task.query, task.maxResults, hasFilters(task.filters));
}
