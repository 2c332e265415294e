/**
 * Batch Test Fixtures
 *
 * Search tasks of known complexity for batch tests.
 */

import type { SearchTask } from '../../clients/search/types.js';

/**
 * Low complexity (score 0): pauses 500ms by default
 */
export const NEXT_CONFIGS: SearchTask = {
  name: 'next-configs',
  query: 'filename:next.config.js',
  maxResults: 30,
  filters: {},
  tags: ['frontend', 'react'],
};

/**
 * Medium complexity (page size > 50, language filter): pauses 1000ms by default
 */
export const VITE_CONFIGS: SearchTask = {
  name: 'vite-configs',
  query: 'filename:vite.config.ts',
  maxResults: 80,
  filters: { language: 'typescript' },
  tags: ['frontend', 'vue'],
};

/**
 * High complexity (many terms, page size > 100, language filter): pauses 2000ms by default
 */
export const GO_MODULES: SearchTask = {
  name: 'go-modules',
  query: 'filename:go.mod module require replace',
  maxResults: 150,
  filters: { language: 'go' },
  tags: ['backend'],
};

export const THREE_TASKS: SearchTask[] = [NEXT_CONFIGS, VITE_CONFIGS, GO_MODULES];
