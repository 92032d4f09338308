import type { KeyValueStorage } from '@tasksift/core';

/**
 * Process-local key-value storage. Values are cloned on the way in and out,
 * so callers never share mutable state with the store.
 */
export class MemoryStorageAdapter implements KeyValueStorage {
  constructor(private readonly map = new Map<string, unknown>()) {}

  async get(key: string): Promise<unknown> {
    const value = this.map.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  async put(key: string, value: unknown): Promise<void> {
    this.map.set(key, structuredClone(value));
  }

  async remove(key: string): Promise<void> {
    this.map.delete(key);
  }

  /** Stored keys, in insertion order */
  keys(): string[] {
    return Array.from(this.map.keys());
  }
}
