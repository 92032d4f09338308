/**
 * Highlighter
 *
 * Helpers for rendering highlight spans of a search result.
 *
 * @module search/Highlighter
 */

import type { SearchableFieldName, SearchHighlight, SearchResult } from '../fts/types';

export interface HighlightMarkers {
  /** Inserted before each highlighted run */
  open?: string;
  /** Inserted after each highlighted run */
  close?: string;
}

/**
 * Highlights recorded for one field.
 */
export function highlightsFor(result: SearchResult, field: SearchableFieldName): SearchHighlight[] {
  return result.highlights.filter((h) => h.fieldName === field);
}

export function hasMatch(result: SearchResult, field: SearchableFieldName): boolean {
  return result.matchedFields.has(field);
}

/**
 * Coalesce overlapping or touching spans into sorted, disjoint [start, end) ranges.
 */
export function mergeSpans(highlights: readonly SearchHighlight[]): Array<[number, number]> {
  const spans = highlights
    .filter((h) => h.length > 0)
    .map((h): [number, number] => [h.offset, h.offset + h.length])
    .sort((a, b) => a[0] - b[0] || a[1] - b[1]);

  const merged: Array<[number, number]> = [];
  for (const [start, end] of spans) {
    const last = merged[merged.length - 1];
    if (last && start <= last[1]) {
      last[1] = Math.max(last[1], end);
    } else {
      merged.push([start, end]);
    }
  }
  return merged;
}

/**
 * Wrap highlighted runs of `text` in markers.
 *
 * Spans from different terms may overlap (a quoted phrase and a word inside
 * it); they are merged so markers never nest. Spans past the end of the text
 * are cut at the end.
 *
 * @example
 * ```typescript
 * highlightText('Buy milk', [{ fieldName: 'title', offset: 0, length: 3, matchedText: 'Buy' }]);
 * // '<mark>Buy</mark> milk'
 * ```
 */
export function highlightText(
  text: string,
  highlights: readonly SearchHighlight[],
  markers: HighlightMarkers = {}
): string {
  const open = markers.open ?? '<mark>';
  const close = markers.close ?? '</mark>';

  let output = '';
  let cursor = 0;
  for (const [rawStart, rawEnd] of mergeSpans(highlights)) {
    const start = Math.max(rawStart, cursor);
    const end = Math.min(rawEnd, text.length);
    if (start >= end) {
      continue;
    }
    output += text.slice(cursor, start) + open + text.slice(start, end) + close;
    cursor = end;
  }
  return output + text.slice(cursor);
}
