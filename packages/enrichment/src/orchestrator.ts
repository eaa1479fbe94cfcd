/**
 * @fileoverview Enrichment of ranked titles through the cache and fetcher.
 *
 * Entities are processed strictly one at a time: the fetcher's call budget
 * and backoff sleeps are shared state that must not be raced.
 *
 * @module @boxoffice/enrichment/orchestrator
 */

import type {
  CacheEntry,
  EnrichedMetadata,
  EnrichmentProgress,
  EnrichmentResult,
  EnrichmentStats,
  RankedEntity,
} from '@boxoffice/contracts';
import { createSilentLogger, startTimer, type Logger } from '@boxoffice/logger';
import { makeCacheKey, type MetadataCache } from '@boxoffice/metadata-cache';
import type { FetchOutcome, MetadataFetcher } from '@boxoffice/provider-omdb';
import { extractYearHint } from './year-hint.js';

export const DEFAULT_PROGRESS_INTERVAL = 50;

/**
 * The parts of MetadataFetcher the orchestrator drives.
 */
export type MetadataResolver = Pick<MetadataFetcher, 'resolve' | 'callsMade' | 'callsRemaining'>;

export interface EnrichmentOrchestratorConfig {
  cache: MetadataCache;
  fetcher: MetadataResolver;
  logger?: Logger;

  /** Entities between progress reports; 0 disables them */
  progressInterval?: number;

  onProgress?: (progress: EnrichmentProgress) => void;

  /** Clock for `storedAt` stamps */
  now?: () => Date;
}

export interface EnrichmentRunOptions {
  /** Checked between entities */
  signal?: AbortSignal;
}

type RunCounters = Omit<
  EnrichmentStats,
  'callsMade' | 'callsRemaining' | 'totalCached' | 'cachedMatches' | 'cachedNotFound' | 'cachedErrors'
>;

/**
 * Converts a fetch outcome into the entry persisted for it. Budget
 * exhaustion is never cached.
 */
function toCacheEntry(title: string, outcome: Exclude<FetchOutcome, { kind: 'budget_exhausted' }>, storedAt: string): CacheEntry {
  switch (outcome.kind) {
    case 'matched':
      return { kind: 'matched', storedAt, metadata: outcome.metadata };
    case 'not_found':
      return { kind: 'not_found', storedAt, title };
    case 'error':
      return { kind: 'error', storedAt, title, reason: outcome.reason };
  }
}

/**
 * Resolves metadata for ranked titles, reading through the cache.
 *
 * Every outcome other than budget exhaustion is cached before the next
 * entity starts, so a rerun after a crash repeats no completed lookup.
 * Once the budget runs out, remaining cache misses are skipped while cache
 * hits still resolve.
 *
 * @example
 * ```typescript
 * const orchestrator = new EnrichmentOrchestrator({ cache, fetcher, logger });
 * const { enriched, stats } = await orchestrator.run(aggregator.rank(800));
 * ```
 */
export class EnrichmentOrchestrator {
  private readonly cache: MetadataCache;
  private readonly fetcher: MetadataResolver;
  private readonly logger: Logger;
  private readonly progressInterval: number;
  private readonly onProgress: ((progress: EnrichmentProgress) => void) | undefined;
  private readonly now: () => Date;

  constructor(config: EnrichmentOrchestratorConfig) {
    this.cache = config.cache;
    this.fetcher = config.fetcher;
    this.logger = (config.logger ?? createSilentLogger()).child({ component: 'enrichment' });
    this.progressInterval = Math.max(0, config.progressInterval ?? DEFAULT_PROGRESS_INTERVAL);
    this.onProgress = config.onProgress;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Enriches entities in rank order.
   *
   * @throws CachePersistenceError when an outcome cannot be stored
   * @throws AuthenticationError when the API key is rejected
   */
  async run(entities: readonly RankedEntity[], options: EnrichmentRunOptions = {}): Promise<EnrichmentResult> {
    const timer = startTimer();
    const enriched: EnrichedMetadata[] = [];
    const skipped: string[] = [];
    const counters: RunCounters = {
      processed: 0,
      matched: 0,
      notFound: 0,
      errored: 0,
      skipped: 0,
      cacheHits: 0,
      networkLookups: 0,
    };

    let budgetSpent = false;
    let cancelled = false;

    this.logger.info('Enrichment started', {
      entities: entities.length,
      cached: this.cache.size,
      callsRemaining: this.fetcher.callsRemaining,
    });

    for (const entity of entities) {
      if (options.signal?.aborted) {
        cancelled = true;
        this.logger.warn('Enrichment cancelled', { processed: counters.processed, total: entities.length });
        break;
      }

      const { title } = entity;
      const year = extractYearHint(title);
      const key = makeCacheKey(title, year);

      const cached = this.cache.get(key);
      if (cached) {
        counters.cacheHits += 1;
        this.logger.debug('Cache hit', { title, cache_key: key, kind: cached.kind });
        this.record(cached, counters, enriched);
      } else if (budgetSpent) {
        counters.skipped += 1;
        skipped.push(title);
      } else {
        const outcome = await this.fetcher.resolve(title, year);

        if (outcome.kind === 'budget_exhausted') {
          budgetSpent = true;
          counters.skipped += 1;
          skipped.push(title);
          this.logger.warn('Call budget exhausted, skipping remaining uncached titles', {
            title,
            remaining: entities.length - counters.processed - 1,
          });
        } else {
          counters.networkLookups += 1;
          const entry = toCacheEntry(title, outcome, this.now().toISOString());
          await this.cache.put(key, entry);
          this.record(entry, counters, enriched);
        }
      }

      counters.processed += 1;
      if (this.progressInterval > 0 && counters.processed % this.progressInterval === 0) {
        this.reportProgress(counters, entities.length);
      }
    }

    const stats: EnrichmentStats = {
      ...counters,
      ...this.cache.stats(),
      callsMade: this.fetcher.callsMade,
      callsRemaining: this.fetcher.callsRemaining,
    };

    this.logger.info('Enrichment complete', { stats, cancelled, duration_ms: timer.stop() });
    return { enriched, skipped, stats, cancelled };
  }

  private record(entry: CacheEntry, counters: RunCounters, enriched: EnrichedMetadata[]): void {
    switch (entry.kind) {
      case 'matched':
        counters.matched += 1;
        enriched.push(entry.metadata);
        break;
      case 'not_found':
        counters.notFound += 1;
        break;
      case 'error':
        counters.errored += 1;
        break;
    }
  }

  private reportProgress(counters: RunCounters, total: number): void {
    const progress: EnrichmentProgress = {
      processed: counters.processed,
      total,
      matched: counters.matched,
      callsRemaining: this.fetcher.callsRemaining,
    };
    this.logger.info('Enrichment progress', { ...progress });
    this.onProgress?.(progress);
  }
}
