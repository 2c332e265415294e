/**
 * Complexity estimation and inter-operation pacing
 */

export {
  estimateComplexity,
  estimateTaskComplexity,
  type OperationComplexity,
} from './complexity-estimator.js';

export { DelayScheduler } from './delay-scheduler.js';
export type { DelaySchedulerOptions, DelaySchedulerStats } from './delay-scheduler.js';
