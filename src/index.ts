/**
 * Search Orchestrator
 *
 * Rate-limit aware batch execution against a remote search API:
 * - Retry engine with error classification and exponential back-off
 * - Complexity-based pacing between searches
 * - Batch execution with performance tracking and reports
 */

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export clients
export * from './clients/index.js';

// Export services
export * from './services/performance/index.js';
export * from './services/batch/index.js';

// Export service types
export * from './services/types/index.js';

export const version = '0.1.0';
