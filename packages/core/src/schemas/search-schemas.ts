// packages/core/src/schemas/search-schemas.ts
import { z } from 'zod';

// --- Queries ---
export const SearchOperatorSchema = z.enum(['AND', 'OR']);

export const SearchTermSchema = z.object({
  text: z.string().min(1),
  exact: z.boolean(),
  negated: z.boolean(),
});

export const SearchQuerySchema = z.object({
  terms: z.array(SearchTermSchema),
  operator: SearchOperatorSchema,
});

// --- Items (record store boundary) ---
export const PrioritySchema = z.enum(['high', 'medium', 'low']);

export const SearchableItemSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  notes: z.string().default(''),
  project: z.string().nullish(),
  context: z.string().nullish(),
  tags: z.array(z.string()).default([]),
  flagged: z.boolean().default(false),
  priority: PrioritySchema.default('medium'),
  // Epoch ms, ISO string or Date; stored as epoch ms
  modifiedAt: z.coerce.date().transform((d) => d.getTime()),
});

// --- Recent searches ---
export const RecentSearchListSchema = z.array(z.string());

export interface RejectedRecord {
  index: number;
  issues: string[];
}

/**
 * Validate raw records from the record store.
 * Invalid records are reported, not thrown, so one bad record never hides the rest.
 */
export function parseSearchableItems(records: readonly unknown[]): {
  items: z.output<typeof SearchableItemSchema>[];
  rejected: RejectedRecord[];
} {
  const items: z.output<typeof SearchableItemSchema>[] = [];
  const rejected: RejectedRecord[] = [];

  records.forEach((record, index) => {
    const result = SearchableItemSchema.safeParse(record);
    if (result.success) {
      items.push(result.data);
    } else {
      rejected.push({
        index,
        issues: result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
    }
  });

  return { items, rejected };
}
