export { RecentSearches, MAX_RECENT_SEARCHES, RECENT_SEARCHES_KEY } from './RecentSearches';
export type { RecentSearchesOptions } from './RecentSearches';
export type { KeyValueStorage, RecentSearchStore } from './types';
