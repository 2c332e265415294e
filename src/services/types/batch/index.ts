/**
 * Service layer batch types
 */

export type {
  BatchSearchInput,
  BatchDefinitionInput,
  BatchDefinition,
  BatchReportMode,
  BatchRunOptions,
} from './batch-input.js';

export type {
  BatchSearchResult,
  BatchComparison,
  BatchResult,
  BatchRunOutput,
} from './batch-result.js';
