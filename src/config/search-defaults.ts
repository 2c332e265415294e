/**
 * Search batch defaults
 */

import type { OperationComplexity } from '../utils/request-scheduler/complexity-estimator.js';

/**
 * Page size used when a batch search does not set maxResults
 */
export const DEFAULT_MAX_RESULTS = 50;

/**
 * Pause inserted after a search of the given complexity, before the next one starts.
 * Heavier searches count more against the secondary (abuse) limit.
 */
export const DEFAULT_COMPLEXITY_DELAYS: Readonly<Record<OperationComplexity, number>> =
  Object.freeze({
    low: 500,
    medium: 1_000,
    high: 2_000,
  });
