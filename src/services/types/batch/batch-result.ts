/**
 * Batch result types
 */

import type { BatchMetrics } from '../performance/performance-metrics.js';

/**
 * Summary of one successful search within a batch
 */
export interface BatchSearchResult {
  name: string;
  query: string;
  tags: string[];
  resultCount: number;
  totalCount?: number;
  incompleteResults?: boolean;
}

/**
 * Cross-search analysis
 */
export interface BatchComparison {
  name: string;
  searchNames: string[];
  commonPatterns: string[];
  keyDifferences: string[];
  summary: string;
}

/**
 * Aggregated outcome of a batch
 */
export interface BatchResult {
  name: string;
  description: string;
  /** Declared number of searches */
  searchCount: number;
  totalResults: number;
  results: BatchSearchResult[];
  comparisons?: BatchComparison[];
}

/**
 * Everything BatchExecutor.run hands back
 */
export interface BatchRunOutput {
  result: BatchResult;
  /** Present unless the report mode is 'none' */
  report?: string;
  /** Final batch metrics */
  metrics: Readonly<BatchMetrics>;
}
