// packages/core/src/schemas/index.ts

// Search schemas (queries, items, recent searches)
export * from './search-schemas';
