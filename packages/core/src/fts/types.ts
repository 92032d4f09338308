/**
 * Full-Text Search Types
 *
 * Type definitions for the FTS (Full-Text Search) module.
 * The engine rescans items linearly per query; nothing here describes an index.
 *
 * @module fts/types
 */

/**
 * Boolean operator applied to the whole query.
 * A query carries exactly one operator, not one per pair of terms.
 */
export type SearchOperator = 'AND' | 'OR';

/**
 * A single token or phrase extracted from a raw query string.
 */
export interface SearchTerm {
  /** Term text as typed (never empty) */
  readonly text: string;

  /** Quoted in the raw query: literal first-occurrence match with double weight */
  readonly exact: boolean;

  /** Preceded by NOT: its presence disqualifies the field it appears in */
  readonly negated: boolean;
}

/**
 * Structured form of a raw query string.
 */
export interface SearchQuery {
  /** Terms in input order */
  readonly terms: readonly SearchTerm[];

  /** Operator for the whole query */
  readonly operator: SearchOperator;
}

/**
 * Names of the item attributes the engine searches.
 */
export type SearchableFieldName = 'title' | 'project' | 'context' | 'tags' | 'notes';

export type Priority = 'high' | 'medium' | 'low';

/**
 * A task record as supplied by the record store.
 */
export interface SearchableItem {
  id: string;
  title: string;
  notes: string;
  project?: string | null;
  context?: string | null;
  tags: readonly string[];
  flagged: boolean;
  priority: Priority;
  /** Last-modified time in epoch milliseconds */
  modifiedAt: number;
}

/**
 * A matched span inside a field.
 * Offsets and lengths are UTF-16 code units of the original-cased field text.
 */
export interface SearchHighlight {
  fieldName: SearchableFieldName;
  offset: number;
  length: number;
  /** Slice of the original text covered by the span */
  matchedText: string;
}

/**
 * Outcome of matching one field against a query.
 */
export interface FieldMatch {
  /** Weighted partial score of the field */
  score: number;

  highlights: SearchHighlight[];

  /** Text of every non-negated term found in the field, in query order */
  matchedTerms: string[];
}

/**
 * A ranked item with its relevance score and highlight spans.
 */
export interface SearchResult<T extends SearchableItem = SearchableItem> {
  itemId: string;

  item: T;

  /** Weighted field sum times boost factors; always > 0 */
  relevanceScore: number;

  /** Highlights in field order, then term order */
  highlights: SearchHighlight[];

  matchedFields: Set<SearchableFieldName>;

  /** Distinct term texts that matched anywhere in the item */
  matchedTerms: string[];
}

export type FieldWeights = Record<SearchableFieldName, number>;

/**
 * Options for scoring a single item.
 */
export interface ScoreOptions {
  /**
   * Reference time for the recency boost, in epoch milliseconds.
   * @default Date.now() read once per call
   */
  now?: number;

  /** Override individual field weights */
  weights?: Partial<FieldWeights>;

  /**
   * Require every non-negated term of an AND query to match somewhere in the item.
   * When false, AND is evaluated per field and one matching term per field suffices.
   * @default false
   */
  strictAnd?: boolean;
}

/**
 * Options for ranking a collection of items.
 */
export interface SearchOptions extends ScoreOptions {
  /** Maximum number of results to return; 0 or less returns none */
  limit?: number;

  /** Minimum relevance score threshold */
  minScore?: number;
}
