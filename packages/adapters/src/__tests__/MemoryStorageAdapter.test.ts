import { RecentSearches } from '@tasksift/core';
import { MemoryStorageAdapter } from '../MemoryStorageAdapter';

describe('MemoryStorageAdapter', () => {
  let storage: MemoryStorageAdapter;

  beforeEach(() => {
    storage = new MemoryStorageAdapter();
  });

  test('should return undefined for a missing key', async () => {
    expect(await storage.get('missing')).toBeUndefined();
  });

  test('should store and remove values', async () => {
    await storage.put('a', ['x']);
    expect(await storage.get('a')).toEqual(['x']);
    expect(storage.keys()).toEqual(['a']);

    await storage.remove('a');
    expect(await storage.get('a')).toBeUndefined();
    expect(storage.keys()).toEqual([]);
  });

  test('should not share stored values with callers', async () => {
    const list = ['x'];
    await storage.put('a', list);
    list.push('y');

    const read = await storage.get('a');
    expect(read).toEqual(['x']);
    expect(read).not.toBe(await storage.get('a'));
  });

  test('should back a recent-search list', async () => {
    const recents = new RecentSearches(storage);
    await recents.save('report');
    await recents.save('milk');
    expect(await recents.list()).toEqual(['milk', 'report']);
    expect(storage.keys()).toEqual(['recentSearches']);
  });
});
