/**
 * Search client contract, structured errors and HTTP failure mapping
 */

export {
  hasFilters,
  type SearchClient,
  type SearchFilters,
  type SearchOutcome,
  type SearchTask,
} from './types.js';

export {
  RateLimitError,
  AbuseRateLimitError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  ValidationError,
  SearchApiError,
  type RateLimitErrorDetails,
} from './errors.js';

export {
  mapHttpError,
  parseRetryAfterHeader,
  type HttpFailure,
} from './http-errors.js';
