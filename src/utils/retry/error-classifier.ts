/**
 * ErrorClassifier
 *
 * Sorts an arbitrary failure into the retry taxonomy and decides whether,
 * and after how long, it is worth retrying.
 *
 * Structured errors from clients/search are the primary contract. Message
 * and error-code matching is a best-effort fallback for unstructured
 * failures (fetch errors, socket errors, proxies returning plain text).
 */

import type { RetryPolicy } from '../../config/retry-policy.js';
import {
  AbuseRateLimitError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  RateLimitError,
  SearchApiError,
  ValidationError,
} from '../../clients/search/errors.js';
import { OperationCancelledError } from './cancellation.js';
import { OperationFailureError } from './errors.js';

/**
 * Retry-relevant class of a failure
 */
export type ErrorClass =
  | 'rate_limit'
  | 'abuse_detection'
  | 'server_error'
  | 'timeout'
  | 'network_error'
  | 'non_retryable';

/**
 * Finer-grained kind of a failure, used for metrics
 */
export type ErrorKind =
  | 'rate_limit'
  | 'abuse_detection'
  | 'server_error'
  | 'timeout'
  | 'network_error'
  | 'authentication'
  | 'authorization'
  | 'not_found'
  | 'validation'
  | 'cancelled'
  | 'unknown';

export interface ClassifiedError {
  errorClass: ErrorClass;
  kind: ErrorKind;
  retryable: boolean;
  /** Delay before the next attempt; 0 for non-retryable errors */
  delayMs: number;
}

/** Minimum cooldown for secondary rate limits */
const ABUSE_BASE_DELAY_MS = 60_000;
/** Added per failed attempt on top of the abuse cooldown */
const ABUSE_ATTEMPT_INCREMENT_MS = 30_000;
/** Gentler growth for timeouts so slow calls don't compound */
const TIMEOUT_BACKOFF_FACTOR = 1.5;
/** Guards against cyclic `cause` chains */
const MAX_UNWRAP_DEPTH = 10;

const ABUSE_PATTERNS = ['secondary rate limit', 'abuse detection', 'abuse rate limit'];
const RATE_LIMIT_PATTERNS = ['rate limit', 'rate_limit', 'too many requests'];
const SERVER_ERROR_PATTERNS = [
  '500',
  '502',
  '503',
  '504',
  'internal server error',
  'bad gateway',
  'service unavailable',
  'gateway timeout',
];
const TIMEOUT_PATTERNS = ['timeout', 'timed out', 'deadline exceeded'];
const NETWORK_PATTERNS = [
  'connection refused',
  'network unreachable',
  'no such host',
  'connection reset',
  'fetch failed',
];
const NETWORK_ERROR_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ENETUNREACH', 'EAI_AGAIN'];

function containsAny(text: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => text.includes(pattern));
}

/** Non-finite reported delays are treated as not reported */
function finiteOrUndefined(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * ErrorClassifier
 *
 * Stateless apart from the policy it computes delays against.
 */
export class ErrorClassifier {
  constructor(private readonly policy: RetryPolicy) {}

  /**
   * Classify a failure of the given attempt
   *
   * @param error - Whatever the operation threw or reported
   * @param attempt - Zero-based index of the failed attempt
   */
  classify(error: unknown, attempt: number): ClassifiedError {
    const root = this.unwrap(error);

    if (root instanceof OperationCancelledError) {
      return this.permanent('cancelled');
    }

    if (root instanceof RateLimitError) {
      const resetMs = finiteOrUndefined(root.resetMs);
      if (resetMs === undefined) {
        return this.retry('rate_limit', 'rate_limit', this.exponentialBackoff(attempt));
      }
      const delay = Math.min(Math.max(0, resetMs), this.policy.rateLimitResetCapMs);
      return this.retry('rate_limit', 'rate_limit', delay);
    }

    if (root instanceof AbuseRateLimitError) {
      return this.retry('abuse_detection', 'abuse_detection', this.abuseDelay(root, attempt));
    }

    if (root instanceof AuthenticationError) return this.permanent('authentication');
    if (root instanceof AuthorizationError) return this.permanent('authorization');
    if (root instanceof NotFoundError) return this.permanent('not_found');
    if (root instanceof ValidationError) return this.permanent('validation');

    if (root instanceof SearchApiError && root.statusCode !== undefined && root.statusCode >= 500) {
      return this.retry('server_error', 'server_error', this.exponentialBackoff(attempt));
    }

    return this.classifyByMessage(root, attempt);
  }

  /**
   * Kind of a failure, looking through errors that wrap another one
   */
  kindOf(error: unknown): ErrorKind {
    return this.classify(error, 0).kind;
  }

  /**
   * Capped exponential back-off: baseDelay × factor^attempt
   */
  exponentialBackoff(attempt: number, factor: number = this.policy.backoffFactor): number {
    const delay = this.policy.baseDelayMs * Math.pow(factor, attempt);
    return Math.min(Math.round(delay), this.policy.maxDelayMs);
  }

  private classifyByMessage(error: unknown, attempt: number): ClassifiedError {
    const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
    const name = error instanceof Error ? error.name : '';
    const code = errorCode(error);

    if (containsAny(message, ABUSE_PATTERNS)) {
      return this.retry('abuse_detection', 'abuse_detection', this.abuseDelay(undefined, attempt));
    }
    if (containsAny(message, RATE_LIMIT_PATTERNS)) {
      return this.retry('rate_limit', 'rate_limit', this.exponentialBackoff(attempt));
    }
    if (containsAny(message, SERVER_ERROR_PATTERNS)) {
      return this.retry('server_error', 'server_error', this.exponentialBackoff(attempt));
    }
    if (name === 'TimeoutError' || code === 'ETIMEDOUT' || containsAny(message, TIMEOUT_PATTERNS)) {
      return this.retry(
        'timeout',
        'timeout',
        this.exponentialBackoff(attempt, TIMEOUT_BACKOFF_FACTOR)
      );
    }
    if (
      (code !== undefined && NETWORK_ERROR_CODES.includes(code)) ||
      containsAny(message, NETWORK_PATTERNS)
    ) {
      return this.retry('network_error', 'network_error', this.exponentialBackoff(attempt));
    }

    return this.permanent('unknown');
  }

  private abuseDelay(error: AbuseRateLimitError | undefined, attempt: number): number {
    const delay =
      finiteOrUndefined(error?.retryAfterMs) ??
      ABUSE_BASE_DELAY_MS + attempt * ABUSE_ATTEMPT_INCREMENT_MS;
    return Math.min(Math.max(0, delay), this.policy.maxDelayMs);
  }

  private unwrap(error: unknown): unknown {
    let current = error;
    for (let depth = 0; depth < MAX_UNWRAP_DEPTH; depth++) {
      if (!(current instanceof OperationFailureError) || current.cause === undefined) {
        break;
      }
      current = current.cause;
    }
    return current;
  }

  private retry(errorClass: ErrorClass, kind: ErrorKind, delayMs: number): ClassifiedError {
    return { errorClass, kind, retryable: true, delayMs };
  }

  private permanent(kind: ErrorKind): ClassifiedError {
    return { errorClass: 'non_retryable', kind, retryable: false, delayMs: 0 };
  }
}
