/**
 * Field Matcher
 *
 * Matches one text field against a parsed query, producing a weighted
 * partial score and highlight spans.
 *
 * Scoring per term (case-insensitive):
 * - exact term, first occurrence found:      weight × 2.0
 * - substring term, field starts with it:    weight × 1.5
 * - substring term, found elsewhere:         weight × 1.0
 *
 * Substring terms add their score once, however many times they occur;
 * every occurrence still gets a highlight.
 *
 * @module fts/FieldMatcher
 */

import { FoldedText } from './FoldedText';
import type { FieldMatch, SearchableFieldName, SearchHighlight, SearchQuery } from './types';

/** Multiplier for a quoted term found in the field */
export const EXACT_MATCH_MULTIPLIER = 2.0;

/** Multiplier for a substring term the field starts with */
export const PREFIX_MATCH_MULTIPLIER = 1.5;

/** Multiplier for a substring term found anywhere else */
export const SUBSTRING_MATCH_MULTIPLIER = 1.0;

/**
 * Start offsets of all non-overlapping occurrences of `needle` in `haystack`.
 * The cursor only moves forward, so the scan is linear in the haystack length.
 */
export function findOccurrences(haystack: string, needle: string): number[] {
  const offsets: number[] = [];
  if (needle.length === 0) {
    return offsets;
  }

  let cursor = 0;
  let index = haystack.indexOf(needle, cursor);
  while (index !== -1) {
    offsets.push(index);
    cursor = index + needle.length;
    index = haystack.indexOf(needle, cursor);
  }
  return offsets;
}

function highlightAt(
  text: FoldedText,
  fieldName: SearchableFieldName,
  start: number,
  length: number
): SearchHighlight {
  const span = text.toSourceSpan(start, length);
  return {
    fieldName,
    offset: span.offset,
    length: span.length,
    matchedText: text.source.slice(span.offset, span.offset + span.length),
  };
}

/**
 * Match a field against a query.
 *
 * AND and OR are evaluated within this field only. Under either operator a
 * field matches when at least one non-negated term is found in it; a negated
 * term found in the field rejects the field outright.
 *
 * @param text - Field text in its original case
 * @param query - Parsed query
 * @param weight - Field weight
 * @param fieldName - Field name recorded on highlights
 * @returns Partial score and highlights, or null when the field does not match
 */
export function matchField(
  text: string,
  query: SearchQuery,
  weight: number,
  fieldName: SearchableFieldName
): FieldMatch | null {
  const field = FoldedText.of(text);
  const highlights: SearchHighlight[] = [];
  const matchedTerms: string[] = [];
  let score = 0;

  for (const term of query.terms) {
    const needle = FoldedText.of(term.text).folded;
    if (needle.length === 0) {
      continue;
    }

    if (term.exact) {
      const index = field.folded.indexOf(needle);
      if (index === -1) {
        continue;
      }
      if (term.negated) {
        return null;
      }
      score += weight * EXACT_MATCH_MULTIPLIER;
      highlights.push(highlightAt(field, fieldName, index, needle.length));
      matchedTerms.push(term.text);
    } else {
      const occurrences = findOccurrences(field.folded, needle);
      if (occurrences.length === 0) {
        continue;
      }
      if (term.negated) {
        return null;
      }
      score +=
        weight *
        (field.folded.startsWith(needle) ? PREFIX_MATCH_MULTIPLIER : SUBSTRING_MATCH_MULTIPLIER);
      for (const index of occurrences) {
        highlights.push(highlightAt(field, fieldName, index, needle.length));
      }
      matchedTerms.push(term.text);
    }
  }

  // Same test for AND and OR: at least one non-negated term found in this field
  if (matchedTerms.length === 0) {
    return null;
  }
  return { score, highlights, matchedTerms };
}
