/**
 * Retry Policy Configuration
 *
 * Defaults and validation for the retry/backoff engine.
 *
 * Environment Variables (optional):
 * - SEARCH_MAX_RETRIES              - Retries after the first attempt
 * - SEARCH_BASE_DELAY_MS            - Base back-off delay
 * - SEARCH_MAX_DELAY_MS             - Back-off ceiling
 * - SEARCH_BACKOFF_FACTOR           - Exponential growth factor
 * - SEARCH_RATE_LIMIT_RESET_CAP_MS  - Ceiling for waiting on a primary rate limit reset
 */

/**
 * Immutable retry policy owned by a RetryExecutor
 */
export interface RetryPolicy {
  /** Retries after the first attempt (operation runs at most maxRetries + 1 times) */
  readonly maxRetries: number;
  /** Delay of the first back-off step in milliseconds */
  readonly baseDelayMs: number;
  /** Upper bound for any computed back-off */
  readonly maxDelayMs: number;
  /** Exponential growth factor (>= 1) */
  readonly backoffFactor: number;
  /**
   * Upper bound for honouring a primary rate limit reset time.
   * Resets can be an hour away; waiting that long inside a batch is never useful.
   */
  readonly rateLimitResetCapMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 5 * 60_000,
  backoffFactor: 2,
  rateLimitResetCapMs: 30_000,
});

/**
 * Error thrown when a retry policy value is out of range
 */
export class InvalidRetryPolicyError extends Error {
  constructor(
    public readonly field: keyof RetryPolicy,
    message: string
  ) {
    super(`Invalid retry policy: ${field} ${message}`);
    this.name = 'InvalidRetryPolicyError';
  }
}

/**
 * Longest delay a Node.js timer honours; larger values fire after 1ms
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

function validate(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new InvalidRetryPolicyError('maxRetries', 'must be an integer >= 0');
  }
  if (!Number.isFinite(policy.baseDelayMs) || policy.baseDelayMs <= 0) {
    throw new InvalidRetryPolicyError('baseDelayMs', 'must be > 0');
  }
  if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs < policy.baseDelayMs) {
    throw new InvalidRetryPolicyError('maxDelayMs', 'must be >= baseDelayMs');
  }
  if (policy.maxDelayMs > MAX_TIMER_DELAY_MS) {
    throw new InvalidRetryPolicyError('maxDelayMs', `must be <= ${MAX_TIMER_DELAY_MS}`);
  }
  if (!Number.isFinite(policy.backoffFactor) || policy.backoffFactor < 1) {
    throw new InvalidRetryPolicyError('backoffFactor', 'must be >= 1');
  }
  if (!Number.isFinite(policy.rateLimitResetCapMs) || policy.rateLimitResetCapMs < 0) {
    throw new InvalidRetryPolicyError('rateLimitResetCapMs', 'must be >= 0');
  }
  if (policy.rateLimitResetCapMs > MAX_TIMER_DELAY_MS) {
    throw new InvalidRetryPolicyError('rateLimitResetCapMs', `must be <= ${MAX_TIMER_DELAY_MS}`);
  }
}

/**
 * Build a validated, frozen retry policy
 *
 * @param overrides - Values replacing the defaults
 * @throws InvalidRetryPolicyError if a value is out of range
 *
 * @example
 * ```typescript
 * const policy = createRetryPolicy({ maxRetries: 2, baseDelayMs: 10 });
 * ```
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...definedOnly(overrides) };
  validate(policy);
  return Object.freeze(policy);
}

const POLICY_FIELDS = [
  'maxRetries',
  'baseDelayMs',
  'maxDelayMs',
  'backoffFactor',
  'rateLimitResetCapMs',
] as const satisfies ReadonlyArray<keyof RetryPolicy>;

type MutablePolicy = { -readonly [K in keyof RetryPolicy]?: RetryPolicy[K] };

function definedOnly(overrides: Partial<RetryPolicy>): MutablePolicy {
  const result: MutablePolicy = {};
  for (const field of POLICY_FIELDS) {
    const value = overrides[field];
    if (value !== undefined) {
      result[field] = value;
    }
  }
  return result;
}

const ENV_VARIABLES: Record<keyof RetryPolicy, string> = {
  maxRetries: 'SEARCH_MAX_RETRIES',
  baseDelayMs: 'SEARCH_BASE_DELAY_MS',
  maxDelayMs: 'SEARCH_MAX_DELAY_MS',
  backoffFactor: 'SEARCH_BACKOFF_FACTOR',
  rateLimitResetCapMs: 'SEARCH_RATE_LIMIT_RESET_CAP_MS',
};

/**
 * Read a retry policy from environment variables
 *
 * Unset or empty variables keep their default.
 *
 * @throws InvalidRetryPolicyError if a variable is not a number or out of range
 */
export function getRetryPolicyFromEnv(
  env: NodeJS.ProcessEnv = process.env
): RetryPolicy {
  const overrides: MutablePolicy = {};

  for (const field of POLICY_FIELDS) {
    const variable = ENV_VARIABLES[field];
    const raw = env[variable]?.trim();
    if (!raw) {
      continue;
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new InvalidRetryPolicyError(field, `must be numeric (${variable}="${raw}")`);
    }
    overrides[field] = value;
  }

  return createRetryPolicy(overrides);
}
