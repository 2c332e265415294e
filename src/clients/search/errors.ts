/**
 * Structured errors reported by a search client
 *
 * These are the error kinds the retry engine understands without falling
 * back to message matching.
 */

export interface RateLimitErrorDetails {
  /** Milliseconds until the primary quota resets */
  resetMs?: number;
  limit?: number;
  remaining?: number;
}

/**
 * Primary rate limit exhausted
 */
export class RateLimitError extends Error {
  public readonly resetMs?: number;
  public readonly limit?: number;
  public readonly remaining?: number;

  constructor(message: string, details: RateLimitErrorDetails = {}) {
    super(message);
    this.name = 'RateLimitError';
    this.resetMs = details.resetMs;
    this.limit = details.limit;
    this.remaining = details.remaining;
  }
}

/**
 * Secondary (abuse detection) rate limit triggered
 */
export class AbuseRateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'AbuseRateLimitError';
  }
}

/**
 * Credentials missing or rejected
 */
export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * Credentials valid but not allowed to perform the search
 */
export class AuthorizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthorizationError';
  }
}

/**
 * Searched resource does not exist
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Query rejected by the API
 *
 * The message carries the first validation detail when one is present.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: string[] = []
  ) {
    super(errors.length > 0 ? `${message}: ${errors[0]}` : message);
    this.name = 'ValidationError';
  }
}

/**
 * Any other failed API response
 */
export class SearchApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'SearchApiError';
  }
}
