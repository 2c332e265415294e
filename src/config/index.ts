/**
 * Configuration exports
 */

export {
  DEFAULT_RETRY_POLICY,
  InvalidRetryPolicyError,
  MAX_TIMER_DELAY_MS,
  createRetryPolicy,
  getRetryPolicyFromEnv,
  type RetryPolicy,
} from './retry-policy.js';

export { DEFAULT_MAX_RESULTS, DEFAULT_COMPLEXITY_DELAYS } from './search-defaults.js';
