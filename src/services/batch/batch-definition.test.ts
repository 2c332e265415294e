/**
 * Unit tests for batch definition helpers
 */

import { describe, it, expect } from 'vitest';
import { prepareBatchDefinition } from './batch-definition.js';
import { BatchDefinitionError } from './errors.js';

describe('prepareBatchDefinition', () => {
  it('should apply defaults to every search', () => {
    const batch = prepareBatchDefinition({
      searches: [{ name: 'next', query: 'filename:next.config.js' }],
    });

    expect(batch).toEqual({
      name: '',
      description: '',
      compare: false,
      tasks: [{ name: 'next', query: 'filename:next.config.js', maxResults: 50, filters: {} }],
    });
  });

  it('should keep declared values', () => {
    const batch = prepareBatchDefinition({
      name: 'Frontend configs',
      description: 'Bundler configuration in the wild',
      compare: true,
      searches: [
        {
          name: 'vite',
          query: 'filename:vite.config.ts',
          maxResults: 100,
          filters: { language: 'typescript', minStars: 10 },
          tags: ['frontend'],
        },
      ],
    });

    expect(batch).toEqual({
      name: 'Frontend configs',
      description: 'Bundler configuration in the wild',
      compare: true,
      tasks: [
        {
          name: 'vite',
          query: 'filename:vite.config.ts',
          maxResults: 100,
          filters: { language: 'typescript', minStars: 10 },
          tags: ['frontend'],
        },
      ],
    });
  });

  it('should require at least one search', () => {
    expect(() => prepareBatchDefinition({ searches: [] })).toThrow(
      'Invalid batch definition: at least one search is required'
    );
  });

  it('should report every invalid search, numbered from 1', () => {
    const error = (() => {
      try {
        prepareBatchDefinition({
          searches: [
            { name: 'ok', query: 'eslint' },
            { name: ' ', query: '', maxResults: 0 },
            { name: 'fractional', query: 'x', maxResults: 2.5 },
          ],
        });
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(BatchDefinitionError);
    expect(error).toMatchObject({
      errors: [
        'search 2: name is required',
        'search 2: query is required',
        'search 2: maxResults must be a positive integer',
        'search 3: maxResults must be a positive integer',
      ],
    });
  });

  it('should reject searches that share a name', () => {
    expect(() =>
      prepareBatchDefinition({
        searches: [
          { name: 'configs', query: 'filename:go.mod' },
          { name: 'lockfiles', query: 'filename:package-lock.json' },
          { name: 'configs ', query: 'filename:Cargo.toml' },
        ],
      })
    ).toThrow("Invalid batch definition: search 3: name 'configs' is already used by search 1");
  });

  it('should copy tags rather than share them', () => {
    const tags = ['frontend'];
    const batch = prepareBatchDefinition({ searches: [{ name: 'a', query: 'b', tags }] });

    tags.push('mutated');

    expect(batch.tasks[0]?.tags).toEqual(['frontend']);
  });
});
