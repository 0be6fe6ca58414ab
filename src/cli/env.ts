/**
 * CLI environment, validated with zod after loading .env
 */

import 'dotenv/config';
import { z } from 'zod';

import { ConfigError } from '~/models/errors';

const envSchema = z.object({
  // Article store
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

  // Files
  SOURCES_FILE: z.string().default('./sources.json'),
  CHECKPOINT_DIR: z.string().default('./data/checkpoints'),
  CACHE_DIR: z.string().default('./data/cache'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Crawl
  SOURCE_CONCURRENCY: z.coerce.number().int().positive().default(1),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new ConfigError(
      'Environment validation failed',
      result.error.issues.map(({ path, message }) => `${path.join('.')}: ${message}`),
    );
  }

  return result.data;
}
