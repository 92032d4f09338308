/**
 * File Storage Adapter
 *
 * Keeps all keys in one JSON object on disk. Writes go to a temporary file
 * that is renamed over the target, so a crash mid-write leaves the previous
 * contents intact.
 *
 * @module FileStorageAdapter
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { logger, StorageError, type KeyValueStorage } from '@tasksift/core';

type StoredData = Record<string, unknown>;

function isStoredData(value: unknown): value is StoredData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ENOTDIR: a parent path component is a regular file, so the file cannot exist
function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}

export class FileStorageAdapter implements KeyValueStorage {
  /** Serializes read-modify-write cycles issued through this adapter */
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async get(key: string): Promise<unknown> {
    const data = await this.read(key);
    return data[key];
  }

  async put(key: string, value: unknown): Promise<void> {
    await this.update(key, (data) => {
      data[key] = value;
    });
  }

  async remove(key: string): Promise<void> {
    await this.update(key, (data) => {
      delete data[key];
    });
  }

  private update(key: string, mutate: (data: StoredData) => void): Promise<void> {
    const run = this.queue.then(async () => {
      const data = await this.read(key);
      mutate(data);
      await this.write(key, data);
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async read(key: string): Promise<StoredData> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        return {};
      }
      throw new StorageError(key, 'read', err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StorageError(key, 'read', err);
    }

    if (!isStoredData(parsed)) {
      logger.warn({ filePath: this.filePath }, 'Storage file does not hold a JSON object, starting empty');
      return {};
    }
    return parsed;
  }

  private async write(key: string, data: StoredData): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      throw new StorageError(key, 'write', err);
    }
  }
}
