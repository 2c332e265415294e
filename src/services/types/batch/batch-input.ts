/**
 * Batch input types
 * Shapes accepted by the batch definition helpers and BatchExecutor
 */

import type { SearchFilters, SearchTask } from '../../../clients/search/types.js';

/**
 * One search as declared by a caller, before defaults are applied
 */
export interface BatchSearchInput {
  name: string;
  query: string;
  /** Defaults to DEFAULT_MAX_RESULTS */
  maxResults?: number;
  /** Defaults to no filters */
  filters?: SearchFilters;
  tags?: string[];
}

/**
 * Batch as declared by a caller (e.g. parsed from a configuration file)
 */
export interface BatchDefinitionInput {
  name?: string;
  description?: string;
  /** Generate comparison analysis when more than one search succeeds */
  compare?: boolean;
  searches: BatchSearchInput[];
}

/**
 * Validated batch, ready to run
 */
export interface BatchDefinition {
  name: string;
  description: string;
  compare: boolean;
  tasks: SearchTask[];
}

/**
 * Which performance report to render after a run
 */
export type BatchReportMode = 'none' | 'summary' | 'detailed';

/**
 * Options for BatchExecutor.run
 */
export interface BatchRunOptions {
  /** @default '' */
  name?: string;
  /** @default '' */
  description?: string;
  /** @default false */
  compare?: boolean;
  /** @default 'none' */
  report?: BatchReportMode;
  signal?: AbortSignal;
}
