/**
 * Result Ranker
 *
 * Scores a collection of items, drops non-matches and orders the rest by
 * descending relevance. Equal scores keep their input order.
 *
 * @module fts/ResultRanker
 */

import { scoreItem } from './ItemScorer';
import { parseQuery } from './QueryParser';
import type { SearchableItem, SearchOptions, SearchQuery, SearchResult } from './types';

function byRelevance(a: SearchResult, b: SearchResult): number {
  return b.relevanceScore - a.relevanceScore;
}

function applyLimits<T extends SearchableItem>(
  results: SearchResult<T>[],
  options: SearchOptions
): SearchResult<T>[] {
  let limited = results;
  if (options.minScore !== undefined) {
    const minScore = options.minScore;
    limited = limited.filter((r) => r.relevanceScore >= minScore);
  }
  if (options.limit !== undefined) {
    limited = limited.slice(0, Math.max(0, options.limit));
  }
  return limited;
}

/**
 * Search items with a parsed query.
 *
 * @example
 * ```typescript
 * const results = search(tasks, parseQuery('report NOT draft'));
 * results[0].itemId;
 * ```
 */
export function search<T extends SearchableItem>(
  items: readonly T[],
  query: SearchQuery,
  options?: SearchOptions
): SearchResult<T>[];
/**
 * Parse a query string, then search items with it.
 */
export function search<T extends SearchableItem>(
  items: readonly T[],
  queryString: string,
  options?: SearchOptions
): SearchResult<T>[];
export function search<T extends SearchableItem>(
  items: readonly T[],
  query: SearchQuery | string,
  options: SearchOptions = {}
): SearchResult<T>[] {
  const parsed = typeof query === 'string' ? parseQuery(query) : query;
  if (items.length === 0 || parsed.terms.length === 0) {
    return [];
  }

  // One reference time for the whole call keeps the recency boost uniform
  const scoreOptions = { ...options, now: options.now ?? Date.now() };

  const results: SearchResult<T>[] = [];
  for (const item of items) {
    const result = scoreItem(item, parsed, scoreOptions);
    if (result) {
      results.push(result);
    }
  }

  // Array.prototype.sort is stable: ties keep input order
  results.sort(byRelevance);

  return applyLimits(results, options);
}

/**
 * Merge ranked result lists from consecutive chunks of one collection.
 *
 * Callers that search large collections in chunks (to yield or cancel between
 * them) get the same order a single call over the whole collection produces,
 * provided the chunks are passed in collection order and scored with one `now`.
 */
export function mergeRankedResults<T extends SearchableItem>(
  chunks: readonly SearchResult<T>[][]
): SearchResult<T>[] {
  const merged = chunks.flat();
  merged.sort(byRelevance);
  return merged;
}
