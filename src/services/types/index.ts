/**
 * Service layer types
 */

// Performance metric types
export type { SearchMetric, BatchMetrics, ErrorCounts } from './performance/index.js';

// Batch types
export type {
  BatchSearchInput,
  BatchDefinitionInput,
  BatchDefinition,
  BatchReportMode,
  BatchRunOptions,
  BatchSearchResult,
  BatchComparison,
  BatchResult,
  BatchRunOutput,
} from './batch/index.js';
