/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * Environment values arrive as strings; `true`/`false` become booleans.
 */
const booleanFlag = z.preprocess((value) => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}, z.boolean());

const count = z.coerce.number().int().nonnegative();
const positiveCount = z.coerce.number().int().positive();

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
      dryRun: booleanFlag.default(false),
      verbose: booleanFlag.default(false),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  input: z
    .object({
      csvPath: z.string().min(1).default('data/raw/revenues_per_day.csv'),
      skipZeroRevenue: booleanFlag.default(false),
    })
    .default({}),

  enrichment: z
    .object({
      topN: positiveCount.default(800),
      progressInterval: count.default(100),
    })
    .default({}),

  omdb: z
    .object({
      apiKey: z.string().min(1).optional(),
      baseUrl: z.string().url().default('http://www.omdbapi.com/'),
      timeoutMs: positiveCount.default(10000),
      maxAttempts: positiveCount.default(3),
      retryDelayMs: count.default(1000),
      dailyLimit: count.default(1000),
    })
    .default({}),

  cache: z
    .object({
      path: z.string().min(1).default('data/cache/omdb_cache.json'),
    })
    .default({}),

  warehouse: z
    .object({
      url: z.string().min(1).default('sqlite:data/warehouse.db'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  DRY_RUN: 'app.dryRun',
  VERBOSE: 'app.verbose',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  REVENUES_CSV_PATH: 'input.csvPath',
  SKIP_ZERO_REVENUE: 'input.skipZeroRevenue',
  TOP_N_MOVIES: 'enrichment.topN',
  PROGRESS_INTERVAL: 'enrichment.progressInterval',
  OMDB_API_KEY: 'omdb.apiKey',
  OMDB_BASE_URL: 'omdb.baseUrl',
  OMDB_TIMEOUT_MS: 'omdb.timeoutMs',
  OMDB_RETRY_ATTEMPTS: 'omdb.maxAttempts',
  OMDB_RETRY_DELAY_MS: 'omdb.retryDelayMs',
  OMDB_DAILY_LIMIT: 'omdb.dailyLimit',
  OMDB_CACHE_PATH: 'cache.path',
  WAREHOUSE_URL: 'warehouse.url',
};
