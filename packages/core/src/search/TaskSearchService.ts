/**
 * TaskSearchService - search box entry point
 *
 * Ranks items for a raw query string and records the query in the recent
 * searches list. The recent-search store sits outside the search path: a
 * search returns without waiting for the query to be recorded, and store
 * failures are logged and never fail a search.
 *
 * @module search/TaskSearchService
 */

import type { SearchConfig } from '../config/env-schema';
import { search } from '../fts/ResultRanker';
import type { SearchableItem, SearchOptions, SearchResult } from '../fts/types';
import { RecentSearches } from '../recent/RecentSearches';
import type { KeyValueStorage, RecentSearchStore } from '../recent/types';
import { logger as defaultLogger, type Logger } from '../utils/logger';
import { extractContext } from './ContextExtractor';
import { highlightsFor } from './Highlighter';

export interface TaskSearchServiceOptions {
  /** Where queries are recorded; omit to disable recent searches */
  recents?: RecentSearchStore;

  /** Defaults applied to every search */
  searchOptions?: SearchOptions;

  /** Characters of context on each side of a notes snippet */
  contextChars?: number;

  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const service = new TaskSearchService({ recents: new RecentSearches(storage) });
 * const results = await service.search(tasks, 'report NOT draft');
 * const recent = await service.recentSearches(); // ['report NOT draft']
 * ```
 */
export class TaskSearchService<T extends SearchableItem = SearchableItem> {
  private readonly recents?: RecentSearchStore;
  private readonly searchOptions: SearchOptions;
  private readonly contextChars?: number;
  private readonly logger: Logger;
  /** Pending query recordings; never rejects */
  private recording: Promise<void> = Promise.resolve();

  constructor(options: TaskSearchServiceOptions = {}) {
    this.recents = options.recents;
    this.searchOptions = options.searchOptions ?? {};
    this.contextChars = options.contextChars;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Build a service from validated configuration.
   *
   * @param config - Output of loadSearchConfig()
   * @param storage - Backing store for recent searches; omit to disable them
   */
  static fromConfig<T extends SearchableItem = SearchableItem>(
    config: SearchConfig,
    storage?: KeyValueStorage
  ): TaskSearchService<T> {
    return new TaskSearchService<T>({
      recents: storage
        ? new RecentSearches(storage, { limit: config.TASKSIFT_RECENT_LIMIT })
        : undefined,
      searchOptions: { strictAnd: config.TASKSIFT_STRICT_AND },
      contextChars: config.TASKSIFT_CONTEXT_CHARS,
      logger: defaultLogger.child({ component: 'search' }, { level: config.LOG_LEVEL }),
    });
  }

  /**
   * Search items for a raw query string.
   * Blank queries return no results and are not recorded.
   */
  async search(items: readonly T[], queryString: string, options?: SearchOptions): Promise<SearchResult<T>[]> {
    if (queryString.trim().length === 0) {
      return [];
    }

    const results = search(items, queryString, { ...this.searchOptions, ...options });
    this.logger.debug(
      { query: queryString, itemCount: items.length, resultCount: results.length },
      'Search executed'
    );

    this.recording = this.recording.then(() => this.recordQuery(queryString));
    return results;
  }

  /**
   * Preview of the first notes match of a result, or null without one.
   */
  notesPreview(result: SearchResult<T>): string | null {
    const [first] = highlightsFor(result, 'notes');
    if (!first) {
      return null;
    }
    return extractContext(result.item.notes, first.offset, first.length, this.contextChars);
  }

  /**
   * Recent queries, most recent first, including queries still being recorded.
   * Empty when the store is unavailable.
   */
  async recentSearches(): Promise<string[]> {
    if (!this.recents) {
      return [];
    }
    await this.recording;
    try {
      return await this.recents.list();
    } catch (err) {
      this.logger.warn({ err }, 'Failed to read recent searches');
      return [];
    }
  }

  /**
   * Remove all recent queries. Store failures propagate to the caller.
   */
  async clearRecentSearches(): Promise<void> {
    await this.recording;
    await this.recents?.clear();
  }

  private async recordQuery(query: string): Promise<void> {
    if (!this.recents) {
      return;
    }
    try {
      await this.recents.save(query);
    } catch (err) {
      this.logger.warn({ err, query }, 'Failed to record recent search');
    }
  }
}
