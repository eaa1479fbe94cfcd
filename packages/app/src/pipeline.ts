/**
 * End-to-end pipeline: rank titles by revenue, enrich the top of the
 * ranking, then load both staging tables.
 */

import {
  ConfigurationError,
  createDataQualityReport,
  type DataQualityReport,
  type EnrichmentResult,
  type RankedEntity,
} from '@boxoffice/contracts';
import { EnrichmentOrchestrator } from '@boxoffice/enrichment';
import { createSilentLogger, getRunId, StageTimings, type Logger } from '@boxoffice/logger';
import { JsonFileMetadataCache } from '@boxoffice/metadata-cache';
import { MetadataFetcher, OmdbClient } from '@boxoffice/provider-omdb';
import { aggregateRevenue, readRevenueObservations, sumTotals } from '@boxoffice/revenue-core';
import { connect, WarehouseLoader, type LoadValidation } from '@boxoffice/warehouse';
import type { Config } from './config/index.js';

/**
 * Collaborators a caller may substitute, mainly for tests
 */
export interface PipelineDeps {
  logger?: Logger;

  /** Fetch used for OMDb requests */
  fetch?: typeof fetch;

  /** Backoff sleep between lookup attempts */
  sleep?: (ms: number) => Promise<void>;

  /** Stops enrichment between titles */
  signal?: AbortSignal;
}

export interface WarehouseReport {
  revenuesLoaded: number;
  moviesLoaded: number;
  validation: LoadValidation;
}

export interface PipelineReport {
  runId: string | undefined;
  dataQuality: DataQualityReport;

  /** Titles selected for enrichment */
  ranked: number;

  /** Sum over the selected titles, as a decimal string */
  rankedRevenue: string;

  enrichment: EnrichmentResult['stats'];
  skipped: string[];
  cancelled: boolean;

  /** Absent on dry runs and cancelled runs */
  warehouse?: WarehouseReport;

  /** Stage durations in milliseconds */
  timings: Record<string, number>;
}

/**
 * Runs the pipeline once.
 *
 * @throws InputFileNotFoundError when the revenue file is missing
 * @throws ConfigurationError when no OMDb API key is configured
 * @throws CacheLockedError when another process holds the cache
 */
export async function runPipeline(config: Config, deps: PipelineDeps = {}): Promise<PipelineReport> {
  const logger = (deps.logger ?? createSilentLogger()).child({ component: 'pipeline' });
  const timings = new StageTimings();
  const csvPath = config.input.csvPath;

  timings.start('aggregate');
  const dataQuality = createDataQualityReport();
  const ranked = await aggregateRevenue(
    readRevenueObservations(csvPath, {
      skipZeroRevenue: config.input.skipZeroRevenue,
      logger: deps.logger,
      report: dataQuality,
    }),
    { topN: config.enrichment.topN }
  );
  const rankedRevenue = sumTotals(ranked).toFixed();
  timings.stop('aggregate');

  const top = ranked[0];
  logger.info('Ranked titles by revenue', {
    count: ranked.length,
    topN: config.enrichment.topN,
    top_title: top?.title,
    top_revenue: top?.totalRevenue.toFixed(),
  });

  const apiKey = config.omdb.apiKey;
  if (apiKey === undefined) {
    throw new ConfigurationError('OMDB_API_KEY is not set', { setting: 'OMDB_API_KEY' });
  }

  const client = new OmdbClient({
    apiKey,
    baseUrl: config.omdb.baseUrl,
    timeoutMs: config.omdb.timeoutMs,
    fetch: deps.fetch,
    logger: deps.logger,
  });
  const fetcher = new MetadataFetcher(client, {
    maxAttempts: config.omdb.maxAttempts,
    retryDelayMs: config.omdb.retryDelayMs,
    dailyLimit: config.omdb.dailyLimit,
    sleep: deps.sleep,
    logger: deps.logger,
  });

  timings.start('enrich');
  const enrichment = await enrich(config, ranked, fetcher, deps);
  timings.stop('enrich');

  const report: PipelineReport = {
    runId: getRunId(),
    dataQuality,
    ranked: ranked.length,
    rankedRevenue,
    enrichment: enrichment.stats,
    skipped: enrichment.skipped,
    cancelled: enrichment.cancelled,
    timings: {},
  };

  if (config.app.dryRun) {
    logger.info('Dry run, skipping warehouse load');
  } else if (enrichment.cancelled) {
    logger.warn('Run cancelled, skipping warehouse load');
  } else {
    timings.start('load');
    report.warehouse = await loadWarehouse(config, enrichment, deps.logger);
    timings.stop('load');
  }

  report.timings = timings.toJSON();
  logger.info('Pipeline finished', { timings: report.timings, dry_run: config.app.dryRun });
  return report;
}

async function enrich(
  config: Config,
  ranked: readonly RankedEntity[],
  fetcher: MetadataFetcher,
  deps: PipelineDeps
): Promise<EnrichmentResult> {
  const cache = await JsonFileMetadataCache.open({ path: config.cache.path, logger: deps.logger });
  try {
    const orchestrator = new EnrichmentOrchestrator({
      cache,
      fetcher,
      logger: deps.logger,
      progressInterval: config.enrichment.progressInterval,
    });
    return await orchestrator.run(ranked, { signal: deps.signal });
  } finally {
    await cache.close();
  }
}

async function loadWarehouse(
  config: Config,
  enrichment: EnrichmentResult,
  logger: Logger | undefined
): Promise<WarehouseReport> {
  const db = await connect(config.warehouse.url, { logger });
  try {
    const loader = new WarehouseLoader(db, { logger });
    await loader.ensureSchema();

    // Second streaming pass; row warnings were already logged by the first
    const revenuesLoaded = await loader.loadRevenues(
      readRevenueObservations(config.input.csvPath, { skipZeroRevenue: config.input.skipZeroRevenue })
    );
    const moviesLoaded = await loader.loadMovies(enrichment.enriched);
    const validation = await loader.validateLoad();

    return { revenuesLoaded, moviesLoaded, validation };
  } finally {
    await db.close();
  }
}
