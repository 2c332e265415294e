/**
 * Comparison analysis across the searches of a batch
 */

import type { SearchTask } from '../../clients/search/types.js';
import type { BatchComparison, BatchSearchResult } from '../types/batch/index.js';

function sharedTags(results: readonly BatchSearchResult[]): string[] {
  const [first, ...rest] = results;
  if (!first) {
    return [];
  }
  return first.tags.filter((tag) => rest.every((result) => result.tags.includes(tag)));
}

/**
 * Language filter of the task behind each result; results[i] came from tasks[i]
 */
function languagesByResult(
  results: readonly BatchSearchResult[],
  tasks: readonly SearchTask[]
): Array<string | undefined> {
  return results.map((_, index) => tasks[index]?.filters.language);
}

function resultCountSpread(results: readonly BatchSearchResult[]): string | undefined {
  const [first, ...rest] = results;
  if (!first) {
    return undefined;
  }

  let lowest = first;
  let highest = first;
  for (const result of rest) {
    if (result.resultCount < lowest.resultCount) lowest = result;
    if (result.resultCount > highest.resultCount) highest = result;
  }

  if (lowest.resultCount === highest.resultCount) {
    return undefined;
  }
  return (
    `Result counts range from ${lowest.resultCount} (${lowest.name}) ` +
    `to ${highest.resultCount} (${highest.name})`
  );
}

/**
 * Summarize what the searches of a batch have in common and where they differ
 *
 * @param results - Results of the batch, in order
 * @param tasks - The tasks that produced them, in the same order, used for filter details
 * @returns A single overall analysis
 */
export function generateComparisons(
  results: readonly BatchSearchResult[],
  tasks: readonly SearchTask[]
): BatchComparison[] {
  const totalResults = results.reduce((sum, result) => sum + result.resultCount, 0);
  const languages = languagesByResult(results, tasks);

  const commonPatterns: string[] = [];
  const keyDifferences: string[] = [];

  const tags = sharedTags(results);
  if (tags.length > 0) {
    commonPatterns.push(`Shared tags: ${tags.join(', ')}`);
  }

  const [firstLanguage] = languages;
  if (
    firstLanguage !== undefined &&
    firstLanguage !== '' &&
    languages.every((language) => language === firstLanguage)
  ) {
    commonPatterns.push(`All searches target language: ${firstLanguage}`);
  }

  if (results.length > 0 && results.every((result) => result.resultCount > 0)) {
    commonPatterns.push('Every search returned results');
  }

  const spread = resultCountSpread(results);
  if (spread) {
    keyDifferences.push(spread);
  }

  const empty = results.filter((result) => result.resultCount === 0).map((result) => result.name);
  if (empty.length > 0) {
    keyDifferences.push(`No results for: ${empty.join(', ')}`);
  }

  const distinctLanguages = [
    ...new Set(
      languages.filter((language): language is string => language !== undefined && language !== '')
    ),
  ].sort();
  if (distinctLanguages.length > 1) {
    keyDifferences.push(`Languages compared: ${distinctLanguages.join(', ')}`);
  }

  return [
    {
      name: 'Overall Analysis',
      searchNames: results.map((result) => result.name),
      commonPatterns,
      keyDifferences,
      summary: `Analyzed ${results.length} searches with ${totalResults} total results`,
    },
  ];
}
