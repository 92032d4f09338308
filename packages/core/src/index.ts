// Full-text search engine
export * from './fts';

// Snippets, highlight rendering and the search service
export * from './search';

// Recent searches
export * from './recent';

// Score breakdown
export * from './debug';

// Schemas (queries, items, recent searches)
export * from './schemas';

// Configuration
export * from './config';

// Errors
export { TaskSiftError, ConfigError, StorageError } from './errors';

// Logging
export { logger, type Logger } from './utils/logger';
