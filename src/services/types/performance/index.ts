/**
 * Service layer performance types
 */

export type { SearchMetric, BatchMetrics, ErrorCounts } from './performance-metrics.js';
