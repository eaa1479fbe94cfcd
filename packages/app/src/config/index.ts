/**
 * Configuration loading and management
 */

import { ConfigurationError } from '@boxoffice/contracts';
import type { Logger } from '@boxoffice/logger';
import { configSchema, envMapping, type Config } from './schema.js';

/**
 * Values that take precedence over the environment, e.g. command-line flags
 */
export interface ConfigOverrides {
  dryRun?: boolean;
  verbose?: boolean;
  topN?: number;
}

export interface LoadConfigOptions {
  /** @default process.env */
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  logger?: Logger;
}

type RawConfig = Record<string, Record<string, unknown>>;

/**
 * Load configuration from environment and defaults
 *
 * Empty environment values are treated as unset.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey]?.trim();
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const { overrides = {} } = options;
  if (overrides.dryRun !== undefined) setNestedProperty(rawConfig, 'app.dryRun', overrides.dryRun);
  if (overrides.verbose !== undefined) setNestedProperty(rawConfig, 'app.verbose', overrides.verbose);
  if (overrides.topN !== undefined) setNestedProperty(rawConfig, 'enrichment.topN', overrides.topN);

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${settingName(e.path)}: ${e.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  options.logger?.info('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

/**
 * Set a `section.key` property
 */
function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const [section, key] = path.split('.');
  if (!section || !key) return;
  const target = obj[section] ?? {};
  target[key] = value;
  obj[section] = target;
}

/**
 * Reports a schema path by its environment variable where one maps to it
 */
function settingName(path: Array<string | number>): string {
  const dotted = path.join('.');
  const envKey = Object.keys(envMapping).find((key) => envMapping[key] === dotted);
  return envKey ?? dotted;
}

/**
 * Get configuration summary for logging. The API key is reported only as
 * present or absent.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    dryRun: config.app.dryRun,
    verbose: config.app.verbose,
    input: config.input.csvPath,
    topN: config.enrichment.topN,
    omdb: {
      baseUrl: config.omdb.baseUrl,
      apiKeyConfigured: config.omdb.apiKey !== undefined,
      dailyLimit: config.omdb.dailyLimit,
      maxAttempts: config.omdb.maxAttempts,
    },
    cache: config.cache.path,
    warehouse: config.warehouse.url.replace(/:[^:@/]+@/, ':***@'),
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      filePath: config.logging.filePath,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
