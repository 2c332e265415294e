/**
 * Search client contract
 *
 * The orchestration core never talks to the remote API directly. It drives
 * a SearchClient, which performs exactly one remote search per call.
 */

/**
 * Filter options attached to a search task
 */
export interface SearchFilters {
  language?: string;
  filename?: string;
  extension?: string;
  repository?: string[];
  path?: string;
  owner?: string[];
  size?: string;
  minStars?: number;
  maxAge?: string;
  fork?: string;
  match?: string[];
}

/**
 * A single named search within a batch
 */
export interface SearchTask {
  /** Unique, non-empty task name */
  name: string;
  /** Raw query terms */
  query: string;
  /** Requested page size (> 0) */
  maxResults: number;
  filters: SearchFilters;
  tags?: string[];
}

/**
 * Result of one remote search call
 *
 * A populated `error` marks the call as failed, exactly as if the client
 * had thrown it.
 */
export interface SearchOutcome {
  /** Number of items returned by this call */
  resultCount: number;
  /** Total matches reported by the API, when available */
  totalCount?: number;
  /** Whether the API reported the result set as incomplete */
  incompleteResults?: boolean;
  error?: Error;
}

/**
 * Collaborator that executes one search against the remote API
 */
export interface SearchClient {
  search(task: SearchTask, signal?: AbortSignal): Promise<SearchOutcome>;
}

/**
 * Whether any filter that narrows server-side work is set
 *
 * Only the filters that change the cost of a query count: language,
 * filename, repository, owner and a positive star threshold.
 */
export function hasFilters(filters: SearchFilters): boolean {
  return (
    (filters.language ?? '') !== '' ||
    (filters.filename ?? '') !== '' ||
    (filters.repository?.length ?? 0) > 0 ||
    (filters.owner?.length ?? 0) > 0 ||
    (filters.minStars ?? 0) > 0
  );
}
