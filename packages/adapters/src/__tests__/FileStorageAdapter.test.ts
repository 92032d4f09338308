import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RecentSearches, StorageError, logger } from '@tasksift/core';
import { FileStorageAdapter } from '../FileStorageAdapter';

describe('FileStorageAdapter', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tasksift-'));
    filePath = path.join(dir, 'nested', 'recent.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('should read a missing file as empty', async () => {
    const storage = new FileStorageAdapter(filePath);
    expect(await storage.get('recentSearches')).toBeUndefined();
  });

  test('should create parent directories and persist values as JSON', async () => {
    const storage = new FileStorageAdapter(filePath);
    await storage.put('recentSearches', ['milk', 'report']);

    const onDisk: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(onDisk).toEqual({ recentSearches: ['milk', 'report'] });
  });

  test('should keep other keys when writing one', async () => {
    const storage = new FileStorageAdapter(filePath);
    await storage.put('a', 1);
    await storage.put('b', 2);
    await storage.remove('a');

    expect(await storage.get('a')).toBeUndefined();
    expect(await storage.get('b')).toBe(2);
  });

  test('should be visible to a second adapter on the same file', async () => {
    await new FileStorageAdapter(filePath).put('recentSearches', ['milk']);
    expect(await new FileStorageAdapter(filePath).get('recentSearches')).toEqual(['milk']);
  });

  test('should not lose concurrent writes through one adapter', async () => {
    const storage = new FileStorageAdapter(filePath);
    await Promise.all(['a', 'b', 'c', 'd'].map((key, i) => storage.put(key, i)));

    const onDisk: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(onDisk).toEqual({ a: 0, b: 1, c: 2, d: 3 });
  });

  test('should not leave a temporary file behind', async () => {
    const storage = new FileStorageAdapter(filePath);
    await storage.put('a', 1);
    expect(await fs.readdir(path.dirname(filePath))).toEqual(['recent.json']);
  });

  test('should reject corrupt JSON with a StorageError', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '{not json', 'utf-8');

    const storage = new FileStorageAdapter(filePath);
    await expect(storage.get('recentSearches')).rejects.toBeInstanceOf(StorageError);
    await expect(storage.put('recentSearches', [])).rejects.toThrow('Storage read failed for "recentSearches"');
  });

  test('should start empty when the file holds something other than an object', async () => {
    const warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '[1, 2]', 'utf-8');

    const storage = new FileStorageAdapter(filePath);
    expect(await storage.get('0')).toBeUndefined();
    expect(warn).toHaveBeenCalledWith(
      { filePath },
      'Storage file does not hold a JSON object, starting empty'
    );
    warn.mockRestore();
  });

  test('should report write failures with a StorageError', async () => {
    // A regular file where the parent directory should be
    await fs.writeFile(path.join(dir, 'nested'), 'blocker', 'utf-8');

    const storage = new FileStorageAdapter(filePath);
    const error: unknown = await storage.put('recentSearches', []).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(StorageError);
    if (!(error instanceof StorageError)) return;
    expect(error.key).toBe('recentSearches');
    expect(error.message.startsWith('Storage write failed for "recentSearches": ')).toBe(true);
  });

  test('should keep working after a failed write', async () => {
    await fs.writeFile(path.join(dir, 'nested'), 'blocker', 'utf-8');
    const storage = new FileStorageAdapter(filePath);
    await expect(storage.put('a', 1)).rejects.toBeInstanceOf(StorageError);

    await fs.rm(path.join(dir, 'nested'));
    await storage.put('a', 2);
    expect(await storage.get('a')).toBe(2);
  });

  test('should persist recent searches across instances', async () => {
    await new RecentSearches(new FileStorageAdapter(filePath)).save('report');
    await new RecentSearches(new FileStorageAdapter(filePath)).save('milk');
    expect(await new RecentSearches(new FileStorageAdapter(filePath)).list()).toEqual(['milk', 'report']);
  });
});
