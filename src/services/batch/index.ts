/**
 * Batch execution
 */

export { BatchExecutor } from './batch-executor.js';
export type { BatchExecutorDependencies } from './batch-executor.js';

export { prepareBatchDefinition } from './batch-definition.js';
export { generateComparisons } from './batch-comparison.js';
export { BatchSearchFailedError, BatchCancelledError, BatchDefinitionError } from './errors.js';
