/**
 * Runtime Configuration
 *
 * Environment variables are parsed once with zod and handed to the engine
 * factory; nothing below src/services reads process.env directly.
 */

import { config as loadDotenv } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@/errors/corpus';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_SIZE: intFromEnv(5),
  DB_SSL: z.enum(['require', 'disable']).optional(),

  EMBEDDING_API_KEY: z.string().min(1).optional(),
  EMBEDDING_API_BASE: z.string().url().default('https://api.openai.com/v1'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-large'),
  EMBEDDING_DIMENSIONS: intFromEnv(3072),
  EMBEDDING_CACHE_SIZE: intFromEnv(1000),
  EMBEDDING_BATCH_SIZE: intFromEnv(100),
  EMBEDDING_MAX_ATTEMPTS: intFromEnv(3),

  TAG_SYNONYMS_PATH: z.string().min(1).default('data/tag_synonyms.json'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  NODE_ENV: z.string().optional(),
});

export interface CorpusConfig {
  database: {
    url: string;
    poolSize: number;
    ssl: 'require' | false;
  };
  embedding: {
    apiKey?: string;
    apiBase: string;
    model: string;
    dimensions: number;
    cacheSize: number;
    batchSize: number;
    maxAttempts: number;
  };
  tagSynonymsPath: string;
}

/**
 * Parse configuration from an environment map
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws ConfigError listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CorpusConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  const production = values.NODE_ENV === 'production';

  return {
    database: {
      url: values.DATABASE_URL,
      poolSize: values.DB_POOL_SIZE,
      // SSL on by default in production, opt-out via DB_SSL=disable
      ssl: (values.DB_SSL ?? (production ? 'require' : 'disable')) === 'require' ? 'require' : false,
    },
    embedding: {
      apiKey: values.EMBEDDING_API_KEY,
      apiBase: values.EMBEDDING_API_BASE.replace(/\/+$/, ''),
      model: values.EMBEDDING_MODEL,
      dimensions: values.EMBEDDING_DIMENSIONS,
      cacheSize: values.EMBEDDING_CACHE_SIZE,
      batchSize: values.EMBEDDING_BATCH_SIZE,
      maxAttempts: values.EMBEDDING_MAX_ATTEMPTS,
    },
    tagSynonymsPath: resolve(values.TAG_SYNONYMS_PATH),
  };
}

/**
 * Load `.env` (if present) into process.env, then parse it
 */
export function loadConfigFromDotenv(path = '.env'): CorpusConfig {
  loadDotenv({ path: resolve(path) });
  return loadConfig(process.env);
}
