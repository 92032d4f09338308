import type { KeyValueStorage, SearchConfig } from '@tasksift/core';
import { FileStorageAdapter } from './FileStorageAdapter';
import { MemoryStorageAdapter } from './MemoryStorageAdapter';

/**
 * Storage for recent searches: a JSON file when TASKSIFT_RECENT_FILE is set,
 * process memory otherwise.
 */
export function storageFromConfig(config: SearchConfig): KeyValueStorage {
  return config.TASKSIFT_RECENT_FILE
    ? new FileStorageAdapter(config.TASKSIFT_RECENT_FILE)
    : new MemoryStorageAdapter();
}
