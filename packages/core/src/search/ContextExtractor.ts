/**
 * Context Extractor
 *
 * Cuts a preview window around a match for result snippets.
 *
 * @module search/ContextExtractor
 */

/** Marker added where the preview was cut */
export const ELLIPSIS = '...';

/** Default number of characters kept on each side of the match */
export const DEFAULT_CONTEXT_CHARS = 50;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

/**
 * Extract `contextChars` UTF-16 units on each side of a match.
 *
 * Out-of-range offsets are clamped into the text. The window is widened by one
 * unit instead of splitting a surrogate pair at either edge.
 *
 * @example
 * ```typescript
 * extractContext('The quick brown fox jumps', 10, 5, 4);
 * // '...ick brown fox...'
 * ```
 */
export function extractContext(
  text: string,
  matchOffset: number,
  matchLength: number,
  contextChars: number = DEFAULT_CONTEXT_CHARS
): string {
  const context = clamp(Math.floor(contextChars), 0, Number.MAX_SAFE_INTEGER);
  const matchStart = clamp(Math.floor(matchOffset), 0, text.length);
  const matchEnd = clamp(matchStart + clamp(Math.floor(matchLength), 0, text.length), matchStart, text.length);

  let start = Math.max(0, matchStart - context);
  let end = Math.min(text.length, matchEnd + context);

  if (start > 0 && isLowSurrogate(text.charCodeAt(start)) && isHighSurrogate(text.charCodeAt(start - 1))) {
    start -= 1;
  }
  if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1)) && isLowSurrogate(text.charCodeAt(end))) {
    end += 1;
  }

  let preview = text.slice(start, end);
  if (start > 0) {
    preview = ELLIPSIS + preview;
  }
  if (end < text.length) {
    preview = preview + ELLIPSIS;
  }
  return preview;
}
