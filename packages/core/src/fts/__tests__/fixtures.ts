import type { SearchableItem } from '../types';

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Fixed reference time for recency boosts */
export const NOW = Date.UTC(2024, 0, 15, 12, 0, 0);

/** Old enough to never get the recency boost */
export const LONG_AGO = NOW - 30 * DAY_MS;

export function makeItem(overrides: Partial<SearchableItem> & { id: string }): SearchableItem {
  return {
    title: '',
    notes: '',
    tags: [],
    flagged: false,
    priority: 'medium',
    modifiedAt: LONG_AGO,
    ...overrides,
  };
}
