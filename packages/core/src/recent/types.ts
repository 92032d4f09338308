/**
 * Recent search contracts
 *
 * @module recent/types
 */

/**
 * Minimal async key-value storage the recent-search list persists through.
 * Adapters live in @tasksift/adapters.
 */
export interface KeyValueStorage {
  /** Stored value, or undefined when the key is absent */
  get(key: string): Promise<unknown>;
  put(key: string, value: unknown): Promise<void>;
  remove(key: string): Promise<void>;
}

/**
 * Ordered, capped list of past query strings, most recent first.
 */
export interface RecentSearchStore {
  /** Move the query to the front, dropping duplicates and entries past the cap */
  save(query: string): Promise<void>;
  list(): Promise<string[]>;
  clear(): Promise<void>;
}
