import { z } from 'zod';
import { ConfigError } from '../errors';

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(defaultValue)
    .transform((v) => v === 'true');

export const SearchConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Recent searches
  TASKSIFT_RECENT_LIMIT: z.coerce
    .number()
    .int()
    .min(1)
    .max(1000)
    .default(20),
  TASKSIFT_RECENT_FILE: z.string().min(1).optional(),

  // Snippets
  TASKSIFT_CONTEXT_CHARS: z.coerce
    .number()
    .int()
    .min(0)
    .max(10000)
    .default(50),

  // Matching
  TASKSIFT_STRICT_AND: booleanFlag('false'),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;

/**
 * Validate search configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadSearchConfig(env: NodeJS.ProcessEnv = process.env): SearchConfig {
  const result = SearchConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  return result.data;
}
