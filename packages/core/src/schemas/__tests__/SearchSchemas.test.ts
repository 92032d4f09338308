import { parseQuery } from '../../fts/QueryParser';
import {
  RecentSearchListSchema,
  SearchQuerySchema,
  SearchableItemSchema,
  parseSearchableItems,
} from '../search-schemas';

describe('SearchableItemSchema', () => {
  test('should fill defaults for optional fields', () => {
    const item = SearchableItemSchema.parse({ id: '1', title: 'Buy milk', modifiedAt: 1_700_000_000_000 });
    expect(item).toEqual({
      id: '1',
      title: 'Buy milk',
      notes: '',
      tags: [],
      flagged: false,
      priority: 'medium',
      modifiedAt: 1_700_000_000_000,
    });
  });

  test('should convert ISO strings and dates to epoch milliseconds', () => {
    const fromString = SearchableItemSchema.parse({ id: '1', title: 'a', modifiedAt: '2024-01-15T12:00:00.000Z' });
    const fromDate = SearchableItemSchema.parse({ id: '2', title: 'b', modifiedAt: new Date(Date.UTC(2024, 0, 15, 12)) });
    expect(fromString.modifiedAt).toBe(Date.UTC(2024, 0, 15, 12));
    expect(fromDate.modifiedAt).toBe(Date.UTC(2024, 0, 15, 12));
  });

  test('should accept null project and context', () => {
    const item = SearchableItemSchema.parse({ id: '1', title: 'a', project: null, context: null, modifiedAt: 0 });
    expect(item.project).toBeNull();
    expect(item.context).toBeNull();
  });

  test('should reject an unknown priority', () => {
    expect(SearchableItemSchema.safeParse({ id: '1', title: 'a', priority: 'urgent', modifiedAt: 0 }).success).toBe(false);
  });
});

describe('parseSearchableItems', () => {
  test('should keep valid records and report invalid ones by index', () => {
    const { items, rejected } = parseSearchableItems([
      { id: '1', title: 'Buy milk', modifiedAt: 0 },
      { id: '', title: 'No id', modifiedAt: 0 },
      { id: '3', title: 'Bad date', modifiedAt: 'not a date' },
      { id: '4', title: 'Flag', flagged: true, modifiedAt: 0 },
    ]);

    expect(items.map((i) => i.id)).toEqual(['1', '4']);
    expect(rejected.map((r) => r.index)).toEqual([1, 2]);
    expect(rejected[0].issues).toHaveLength(1);
    expect(rejected[0].issues[0].startsWith('id: ')).toBe(true);
    expect(rejected[1].issues[0].startsWith('modifiedAt: ')).toBe(true);
  });

  test('should reject records that are not objects', () => {
    const { items, rejected } = parseSearchableItems([null, 'task']);
    expect(items).toEqual([]);
    expect(rejected.map((r) => r.index)).toEqual([0, 1]);
  });
});

describe('SearchQuerySchema', () => {
  test('should accept parsed queries', () => {
    expect(SearchQuerySchema.safeParse(parseQuery('"bug fix" OR NOT legacy')).success).toBe(true);
  });

  test('should reject empty term text', () => {
    const result = SearchQuerySchema.safeParse({
      terms: [{ text: '', exact: false, negated: false }],
      operator: 'AND',
    });
    expect(result.success).toBe(false);
  });
});

describe('RecentSearchListSchema', () => {
  test('should accept string lists only', () => {
    expect(RecentSearchListSchema.safeParse(['a', 'b']).success).toBe(true);
    expect(RecentSearchListSchema.safeParse(['a', 1]).success).toBe(false);
    expect(RecentSearchListSchema.safeParse('a').success).toBe(false);
  });
});
