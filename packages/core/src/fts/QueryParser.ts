/**
 * Query Parser
 *
 * Converts a raw search box string into a {@link SearchQuery}.
 *
 * Grammar (single pass, no backtracking):
 * - whitespace separates terms
 * - `"..."` groups a phrase into one exact term
 * - `AND` / `OR` (any case) set the operator for the whole query
 * - `NOT` (any case) negates the next term
 *
 * Parsing is total: any string produces a query, possibly with no terms.
 *
 * @example
 * ```typescript
 * parseQuery('"bug fix" OR feature NOT deprecated');
 * // {
 * //   terms: [
 * //     { text: 'bug fix', exact: true, negated: false },
 * //     { text: 'feature', exact: false, negated: false },
 * //     { text: 'deprecated', exact: false, negated: true },
 * //   ],
 * //   operator: 'OR'
 * // }
 * ```
 *
 * @module fts/QueryParser
 */

import type { SearchOperator, SearchQuery, SearchTerm } from './types';

const QUOTE = '"';
const WHITESPACE = /\s/;

/**
 * Query that matches nothing.
 */
export const EMPTY_QUERY: SearchQuery = Object.freeze({
  terms: Object.freeze([]),
  operator: 'AND',
});

type Keyword = 'AND' | 'OR' | 'NOT';

function asKeyword(token: string): Keyword | null {
  const upper = token.toUpperCase();
  return upper === 'AND' || upper === 'OR' || upper === 'NOT' ? upper : null;
}

/**
 * Parse a raw query string.
 *
 * An unterminated quote runs to the end of the input and still yields an exact term.
 * null and undefined parse as the empty query.
 */
export function parseQuery(raw: string | null | undefined): SearchQuery {
  const terms: SearchTerm[] = [];
  let operator: SearchOperator = 'AND';
  let current = '';
  let inQuotes = false;
  let negated = false;

  const pushTerm = (exact: boolean): void => {
    terms.push(Object.freeze({ text: current, exact, negated }));
    current = '';
    negated = false;
  };

  // Unquoted token at a boundary: keywords steer the parse, anything else is a term
  const endToken = (): void => {
    switch (asKeyword(current)) {
      case 'AND':
        operator = 'AND';
        current = '';
        break;
      case 'OR':
        operator = 'OR';
        current = '';
        break;
      case 'NOT':
        negated = true;
        current = '';
        break;
      default:
        pushTerm(false);
    }
  };

  for (const char of raw ?? '') {
    if (char === QUOTE) {
      if (inQuotes) {
        if (current.length > 0) {
          pushTerm(true);
        }
      } else if (current.length > 0) {
        pushTerm(false);
      }
      inQuotes = !inQuotes;
    } else if (!inQuotes && WHITESPACE.test(char)) {
      if (current.length > 0) {
        endToken();
      }
    } else {
      current += char;
    }
  }

  if (current.length > 0) {
    if (inQuotes) {
      pushTerm(true);
    } else {
      endToken();
    }
  }

  if (terms.length === 0) {
    return EMPTY_QUERY;
  }

  return Object.freeze({ terms: Object.freeze(terms), operator });
}
