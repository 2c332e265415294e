/**
 * Unit tests for comparison analysis
 */

import { describe, it, expect } from 'vitest';
import { generateComparisons } from './batch-comparison.js';
import { NEXT_CONFIGS, VITE_CONFIGS, GO_MODULES, THREE_TASKS } from './test-fixtures.js';
import type { BatchSearchResult } from '../types/batch/index.js';
import type { SearchTask } from '../../clients/search/types.js';

function resultFor(task: SearchTask, resultCount: number): BatchSearchResult {
  return { name: task.name, query: task.query, tags: task.tags ?? [], resultCount };
}

describe('generateComparisons', () => {
  it('should produce a single overall analysis', () => {
    const results = [
      resultFor(NEXT_CONFIGS, 12),
      resultFor(VITE_CONFIGS, 0),
      resultFor(GO_MODULES, 40),
    ];

    expect(generateComparisons(results, THREE_TASKS)).toEqual([
      {
        name: 'Overall Analysis',
        searchNames: ['next-configs', 'vite-configs', 'go-modules'],
        commonPatterns: [],
        keyDifferences: [
          'Result counts range from 0 (vite-configs) to 40 (go-modules)',
          'No results for: vite-configs',
          'Languages compared: go, typescript',
        ],
        summary: 'Analyzed 3 searches with 52 total results',
      },
    ]);
  });

  it('should report a language shared by every search', () => {
    const tsconfig: SearchTask = {
      name: 'tsconfig',
      query: 'filename:tsconfig.json',
      maxResults: 20,
      filters: { language: 'json' },
      tags: ['ts'],
    };
    const eslint: SearchTask = {
      name: 'eslint',
      query: 'filename:.eslintrc.json',
      maxResults: 20,
      filters: { language: 'json' },
      tags: ['ts', 'lint'],
    };

    const [comparison] = generateComparisons(
      [resultFor(tsconfig, 5), resultFor(eslint, 5)],
      [tsconfig, eslint]
    );

    expect(comparison?.commonPatterns).toEqual([
      'Shared tags: ts',
      'All searches target language: json',
      'Every search returned results',
    ]);
    expect(comparison?.keyDifferences).toEqual([]);
  });

  it('should pair each result with its own task when names repeat', () => {
    const goConfigs: SearchTask = {
      name: 'configs',
      query: 'filename:go.mod',
      maxResults: 20,
      filters: { language: 'go' },
    };
    const rustConfigs: SearchTask = {
      name: 'configs',
      query: 'filename:Cargo.toml',
      maxResults: 20,
      filters: { language: 'toml' },
    };

    const [comparison] = generateComparisons(
      [resultFor(goConfigs, 4), resultFor(rustConfigs, 4)],
      [goConfigs, rustConfigs]
    );

    expect(comparison?.commonPatterns).toEqual(['Every search returned results']);
    expect(comparison?.keyDifferences).toEqual(['Languages compared: go, toml']);
  });

  it('should handle no results at all', () => {
    expect(generateComparisons([], [])).toEqual([
      {
        name: 'Overall Analysis',
        searchNames: [],
        commonPatterns: [],
        keyDifferences: [],
        summary: 'Analyzed 0 searches with 0 total results',
      },
    ]);
  });
});
