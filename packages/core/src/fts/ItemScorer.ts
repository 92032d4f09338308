/**
 * Item Scorer
 *
 * Runs the field matcher across every searchable field of an item, sums the
 * weighted partial scores and applies the metadata boost factors.
 *
 * relevance = Σ fieldScore × flagged × priority × recency
 *
 * @module fts/ItemScorer
 */

import { matchField } from './FieldMatcher';
import type {
  FieldMatch,
  FieldWeights,
  Priority,
  ScoreOptions,
  SearchableFieldName,
  SearchableItem,
  SearchHighlight,
  SearchQuery,
  SearchResult,
} from './types';

/**
 * Default field weights. Title matches dominate; notes are a tiebreaker.
 */
export const FIELD_WEIGHTS: Readonly<FieldWeights> = Object.freeze({
  title: 10.0,
  project: 5.0,
  context: 3.0,
  tags: 4.0,
  notes: 1.0,
});

export const FLAGGED_BOOST = 1.2;

export const PRIORITY_BOOST: Readonly<Record<Priority, number>> = Object.freeze({
  high: 1.3,
  medium: 1.0,
  low: 0.9,
});

export const RECENCY_BOOST = 1.1;

/** Items modified less than this long before "now" get {@link RECENCY_BOOST} */
export const RECENCY_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Multipliers applied to an item's summed field score.
 */
export interface BoostFactors {
  flagged: number;
  priority: number;
  recency: number;
}

/**
 * Result of matching one field of an item.
 */
export interface FieldScore {
  field: SearchableFieldName;
  weight: number;
  /** Null when the field is absent or did not match */
  match: FieldMatch | null;
}

interface SearchableField {
  name: SearchableFieldName;
  text: string;
}

/**
 * Present searchable fields of an item, in scoring order.
 * Project and context are skipped when absent, tags when there are none.
 */
export function searchableFields(item: SearchableItem): SearchableField[] {
  const fields: SearchableField[] = [{ name: 'title', text: item.title }];

  if (item.project != null) {
    fields.push({ name: 'project', text: item.project });
  }
  if (item.context != null) {
    fields.push({ name: 'context', text: item.context });
  }
  if (item.tags.length > 0) {
    fields.push({ name: 'tags', text: item.tags.join(' ') });
  }
  fields.push({ name: 'notes', text: item.notes });

  return fields;
}

const FIELD_NAMES: readonly SearchableFieldName[] = ['title', 'project', 'context', 'tags', 'notes'];

/**
 * Default weights with overrides applied. Undefined and non-finite overrides
 * keep the default.
 */
export function resolveWeights(overrides?: Partial<FieldWeights>): FieldWeights {
  const weights: FieldWeights = { ...FIELD_WEIGHTS };
  if (!overrides) {
    return weights;
  }
  for (const name of FIELD_NAMES) {
    const weight = overrides[name];
    if (weight !== undefined && Number.isFinite(weight)) {
      weights[name] = weight;
    }
  }
  return weights;
}

/**
 * Match every present field of an item against the query.
 */
export function matchFields(
  item: SearchableItem,
  query: SearchQuery,
  weights: FieldWeights = FIELD_WEIGHTS
): FieldScore[] {
  return searchableFields(item).map(({ name, text }) => ({
    field: name,
    weight: weights[name],
    match: matchField(text, query, weights[name], name),
  }));
}

/**
 * Boost factors for an item at a given time.
 */
export function boostFactors(item: SearchableItem, now: number): BoostFactors {
  return {
    flagged: item.flagged ? FLAGGED_BOOST : 1.0,
    priority: PRIORITY_BOOST[item.priority] ?? 1.0,
    recency: now - item.modifiedAt < RECENCY_WINDOW_MS ? RECENCY_BOOST : 1.0,
  };
}

/**
 * Apply each boost factor once: flagged, then priority, then recency.
 */
export function applyBoostFactors(score: number, item: SearchableItem, now: number): number {
  const boosts = boostFactors(item, now);
  let boosted = score;
  boosted *= boosts.flagged;
  boosted *= boosts.priority;
  boosted *= boosts.recency;
  return boosted;
}

/**
 * True when every non-negated term of the query matched somewhere in the item.
 */
export function satisfiesStrictAnd(query: SearchQuery, matchedTerms: readonly string[]): boolean {
  if (query.operator !== 'AND') {
    return true;
  }
  return query.terms.every((term) => term.negated || matchedTerms.includes(term.text));
}

/**
 * Score one item against a query.
 *
 * @param item - Item to score
 * @param query - Parsed query
 * @param options - Reference time, weight overrides and AND semantics
 * @returns Search result, or null when no field matched
 */
export function scoreItem<T extends SearchableItem>(
  item: T,
  query: SearchQuery,
  options: ScoreOptions = {}
): SearchResult<T> | null {
  const now = options.now ?? Date.now();
  const weights = resolveWeights(options.weights);

  let totalScore = 0;
  const highlights: SearchHighlight[] = [];
  const matchedFields = new Set<SearchableFieldName>();
  const matchedTerms: string[] = [];

  for (const { field, match } of matchFields(item, query, weights)) {
    if (!match) {
      continue;
    }
    totalScore += match.score;
    highlights.push(...match.highlights);
    matchedFields.add(field);
    for (const term of match.matchedTerms) {
      if (!matchedTerms.includes(term)) {
        matchedTerms.push(term);
      }
    }
  }

  if (!(totalScore > 0)) {
    return null;
  }

  if (options.strictAnd && !satisfiesStrictAnd(query, matchedTerms)) {
    return null;
  }

  return {
    itemId: item.id,
    item,
    relevanceScore: applyBoostFactors(totalScore, item, now),
    highlights,
    matchedFields,
    matchedTerms,
  };
}
