/**
 * HTTP failure mapping
 *
 * Converts a failed response of the remote search API into one of the
 * structured error kinds from errors.ts.
 */

import {
  AbuseRateLimitError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  RateLimitError,
  SearchApiError,
  ValidationError,
  type RateLimitErrorDetails,
} from './errors.js';

export interface HttpFailure {
  status: number;
  /** Error message from the response body */
  message: string;
  headers?: Headers;
}

/**
 * Parse a Retry-After header value
 *
 * Accepts delta-seconds or an HTTP date. A date in the past yields 0.
 *
 * @param value - Raw header value
 * @param now - Current time in epoch milliseconds
 * @returns Delay in milliseconds, or undefined when missing or unparseable
 */
export function parseRetryAfterHeader(
  value: string | null | undefined,
  now: number = Date.now()
): number | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = new Date(trimmed);
  if (isNaN(date.getTime())) {
    return undefined;
  }
  return Math.max(0, date.getTime() - now);
}

function parseIntHeader(headers: Headers | undefined, name: string): number | undefined {
  const raw = headers?.get(name);
  if (!raw) {
    return undefined;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

function rateLimitDetails(headers: Headers | undefined, now: number): RateLimitErrorDetails {
  const details: RateLimitErrorDetails = {
    limit: parseIntHeader(headers, 'X-RateLimit-Limit'),
    remaining: parseIntHeader(headers, 'X-RateLimit-Remaining'),
  };

  // Reset is reported as epoch seconds
  const resetEpoch = parseIntHeader(headers, 'X-RateLimit-Reset');
  if (resetEpoch !== undefined) {
    details.resetMs = Math.max(0, resetEpoch * 1000 - now);
  }
  return details;
}

/**
 * Map a failed API response to a structured error
 *
 * @param failure - Status, message and headers of the response
 * @param now - Current time in epoch milliseconds
 *
 * @example
 * ```typescript
 * if (!response.ok) {
 *   const body = await response.json();
 *   throw mapHttpError({ status: response.status, message: body.message, headers: response.headers });
 * }
 * ```
 */
export function mapHttpError(failure: HttpFailure, now: number = Date.now()): Error {
  const { status, message, headers } = failure;

  switch (status) {
    case 401:
      return new AuthenticationError(message);
    case 403:
      if (message.toLowerCase().includes('rate limit')) {
        return new RateLimitError(message, rateLimitDetails(headers, now));
      }
      return new AuthorizationError(message);
    case 404:
      return new NotFoundError(message);
    case 422:
      return new ValidationError(message, [message]);
    case 429:
      return new AbuseRateLimitError(
        message,
        parseRetryAfterHeader(headers?.get('Retry-After'), now)
      );
    default:
      return new SearchApiError(
        `search API error (status ${status}): ${message}`,
        status
      );
  }
}
