/**
 * Performance tracking and reporting
 */

export { PerformanceTracker, PerformanceTrackerStateError } from './performance-tracker.js';
export type { PerformanceTrackerDependencies } from './performance-tracker.js';

export {
  formatDuration,
  formatPerformanceReport,
  formatSearchBreakdown,
  performanceInsights,
  performanceRecommendations,
} from './performance-report.js';
