/**
 * Full-Text Search Module
 *
 * In-memory search over task records.
 * Features:
 * - Query parser for quoted phrases, AND / OR and NOT
 * - Case-insensitive field matcher with highlight spans in original text
 * - Weighted multi-field scorer with flagged / priority / recency boosts
 * - Stable relevance ranking
 *
 * @module fts
 */

// Types
export type {
  SearchOperator,
  SearchTerm,
  SearchQuery,
  SearchableFieldName,
  Priority,
  SearchableItem,
  SearchHighlight,
  FieldMatch,
  SearchResult,
  FieldWeights,
  ScoreOptions,
  SearchOptions,
} from './types';

// Case folding
export { FoldedText } from './FoldedText';
export type { SourceSpan } from './FoldedText';

// Query parser
export { parseQuery, EMPTY_QUERY } from './QueryParser';

// Field matcher
export {
  matchField,
  findOccurrences,
  EXACT_MATCH_MULTIPLIER,
  PREFIX_MATCH_MULTIPLIER,
  SUBSTRING_MATCH_MULTIPLIER,
} from './FieldMatcher';

// Item scorer
export {
  scoreItem,
  matchFields,
  searchableFields,
  resolveWeights,
  boostFactors,
  applyBoostFactors,
  satisfiesStrictAnd,
  FIELD_WEIGHTS,
  FLAGGED_BOOST,
  PRIORITY_BOOST,
  RECENCY_BOOST,
  RECENCY_WINDOW_MS,
} from './ItemScorer';
export type { BoostFactors, FieldScore } from './ItemScorer';

// Result ranker
export { search, mergeRankedResults } from './ResultRanker';
