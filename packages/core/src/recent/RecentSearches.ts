/**
 * Recent Searches
 *
 * Capped, de-duplicated list of past queries kept in a {@link KeyValueStorage}.
 *
 * @module recent/RecentSearches
 */

import { RecentSearchListSchema } from '../schemas/search-schemas';
import { logger as defaultLogger, type Logger } from '../utils/logger';
import type { KeyValueStorage, RecentSearchStore } from './types';

/** Maximum number of recent searches kept */
export const MAX_RECENT_SEARCHES = 20;

/** Storage key of the list */
export const RECENT_SEARCHES_KEY = 'recentSearches';

export interface RecentSearchesOptions {
  /** @default MAX_RECENT_SEARCHES */
  limit?: number;
  /** @default RECENT_SEARCHES_KEY */
  key?: string;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const recents = new RecentSearches(new MemoryStorageAdapter());
 * await recents.save('report');
 * await recents.save('milk');
 * await recents.list(); // ['milk', 'report']
 * ```
 */
export class RecentSearches implements RecentSearchStore {
  private readonly limit: number;
  private readonly key: string;
  private readonly logger: Logger;
  /** Serializes read-modify-write cycles issued through this instance */
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly storage: KeyValueStorage,
    options: RecentSearchesOptions = {}
  ) {
    this.limit = Math.max(1, options.limit ?? MAX_RECENT_SEARCHES);
    this.key = options.key ?? RECENT_SEARCHES_KEY;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Record a query. Blank queries are ignored; duplicates compare exactly.
   */
  async save(query: string): Promise<void> {
    if (query.trim().length === 0) {
      return;
    }
    await this.enqueue(async () => {
      const existing = await this.read();
      const next = [query, ...existing.filter((q) => q !== query)].slice(0, this.limit);
      await this.storage.put(this.key, next);
    });
  }

  /**
   * Stored queries, most recent first, after pending saves and clears.
   * Data that is not a list of strings reads as an empty list.
   */
  async list(): Promise<string[]> {
    await this.queue;
    return this.read();
  }

  async clear(): Promise<void> {
    await this.enqueue(() => this.storage.remove(this.key));
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task);
    // Keep the chain alive after a failed task; the caller still sees the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async read(): Promise<string[]> {
    const stored = await this.storage.get(this.key);
    if (stored === undefined || stored === null) {
      return [];
    }

    const result = RecentSearchListSchema.safeParse(stored);
    if (!result.success) {
      this.logger.warn({ key: this.key }, 'Ignoring malformed recent searches');
      return [];
    }
    return result.data.slice(0, this.limit);
  }
}
