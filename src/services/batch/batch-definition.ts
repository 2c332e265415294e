/**
 * Batch definition helpers
 *
 * Turns a caller-declared batch into validated search tasks.
 */

import { DEFAULT_MAX_RESULTS } from '../../config/search-defaults.js';
import type { SearchTask } from '../../clients/search/types.js';
import type {
  BatchDefinition,
  BatchDefinitionInput,
  BatchSearchInput,
} from '../types/batch/index.js';
import { BatchDefinitionError } from './errors.js';

function searchErrors(search: BatchSearchInput, position: number): string[] {
  const errors: string[] = [];

  if (search.name.trim() === '') {
    errors.push(`search ${position}: name is required`);
  }
  if (search.query.trim() === '') {
    errors.push(`search ${position}: query is required`);
  }
  if (
    search.maxResults !== undefined &&
    (!Number.isInteger(search.maxResults) || search.maxResults <= 0)
  ) {
    errors.push(`search ${position}: maxResults must be a positive integer`);
  }

  return errors;
}

/**
 * Names identify searches in results, metrics and reports, so each must be unique
 */
function duplicateNameErrors(searches: readonly BatchSearchInput[]): string[] {
  const firstPositions = new Map<string, number>();
  const errors: string[] = [];

  for (const [index, search] of searches.entries()) {
    const name = search.name.trim();
    if (name === '') {
      continue;
    }
    const first = firstPositions.get(name);
    if (first === undefined) {
      firstPositions.set(name, index + 1);
    } else {
      errors.push(`search ${index + 1}: name '${name}' is already used by search ${first}`);
    }
  }

  return errors;
}

function toTask(search: BatchSearchInput): SearchTask {
  const task: SearchTask = {
    name: search.name,
    query: search.query,
    maxResults: search.maxResults ?? DEFAULT_MAX_RESULTS,
    filters: search.filters ?? {},
  };
  if (search.tags !== undefined) {
    task.tags = [...search.tags];
  }
  return task;
}

/**
 * Validate a batch and apply search defaults
 *
 * Every problem is reported at once; searches are numbered from 1.
 *
 * @throws BatchDefinitionError if the batch has no searches, a search is invalid
 * or two searches share a name
 *
 * @example
 * ```typescript
 * const batch = prepareBatchDefinition({
 *   name: 'Frontend configs',
 *   compare: true,
 *   searches: [
 *     { name: 'next', query: 'filename:next.config.js' },
 *     { name: 'vite', query: 'filename:vite.config.ts', maxResults: 100 },
 *   ],
 * });
 *
 * await executor.run(batch.tasks, { name: batch.name, compare: batch.compare });
 * ```
 */
export function prepareBatchDefinition(input: BatchDefinitionInput): BatchDefinition {
  if (input.searches.length === 0) {
    throw new BatchDefinitionError(['at least one search is required']);
  }

  const errors = input.searches.flatMap((search, index) => searchErrors(search, index + 1));
  errors.push(...duplicateNameErrors(input.searches));
  if (errors.length > 0) {
    throw new BatchDefinitionError(errors);
  }

  return {
    name: input.name ?? '',
    description: input.description ?? '',
    compare: input.compare ?? false,
    tasks: input.searches.map(toTask),
  };
}
