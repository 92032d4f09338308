/**
 * Score Explainer
 *
 * Breaks an item's relevance score down into field contributions and boost
 * factors, for tuning weights and answering "why is this ranked first?".
 *
 * @module debug/ScoreExplainer
 */

import {
  applyBoostFactors,
  boostFactors,
  matchFields,
  resolveWeights,
  satisfiesStrictAnd,
  type BoostFactors,
} from '../fts/ItemScorer';
import type { ScoreOptions, SearchableFieldName, SearchableItem, SearchQuery } from '../fts/types';

/**
 * Contribution of one searchable field.
 */
export interface FieldExplanation {
  field: SearchableFieldName;
  weight: number;
  matched: boolean;
  score: number;
  matchedTerms: string[];
  highlightCount: number;
}

/**
 * Full breakdown of an item's score.
 */
export interface ScoreExplanation {
  itemId: string;
  fields: FieldExplanation[];
  /** Sum of field scores before boosts */
  baseScore: number;
  boosts: BoostFactors;
  /** Score a search would report; 0 when the item is not a result */
  finalScore: number;
  /** False when strict AND rejected the item despite field matches */
  strictAndSatisfied: boolean;
  now: number;
}

/**
 * Explain how {@link scoreItem} scores an item.
 *
 * `finalScore` equals the result's `relevanceScore` when the item matches and
 * is 0 otherwise.
 */
export function explainScore(
  item: SearchableItem,
  query: SearchQuery,
  options: ScoreOptions = {}
): ScoreExplanation {
  const now = options.now ?? Date.now();
  const weights = resolveWeights(options.weights);

  const fields: FieldExplanation[] = matchFields(item, query, weights).map(({ field, weight, match }) => ({
    field,
    weight,
    matched: match !== null,
    score: match?.score ?? 0,
    matchedTerms: match?.matchedTerms ?? [],
    highlightCount: match?.highlights.length ?? 0,
  }));

  const baseScore = fields.reduce((sum, f) => sum + f.score, 0);
  const boosts = boostFactors(item, now);

  const matchedTerms = [...new Set(fields.flatMap((f) => f.matchedTerms))];
  const strictAndSatisfied = !options.strictAnd || satisfiesStrictAnd(query, matchedTerms);

  const finalScore = baseScore > 0 && strictAndSatisfied ? applyBoostFactors(baseScore, item, now) : 0;

  return {
    itemId: item.id,
    fields,
    baseScore,
    boosts,
    finalScore,
    strictAndSatisfied,
    now,
  };
}
