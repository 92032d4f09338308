export { SearchConfigSchema, loadSearchConfig } from './env-schema';
export type { SearchConfig } from './env-schema';
