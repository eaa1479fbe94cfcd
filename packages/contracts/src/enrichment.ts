/**
 * @fileoverview Enrichment run statistics and results.
 *
 * @module @boxoffice/contracts/enrichment
 */

import type { CacheStats, EnrichedMetadata } from './metadata.js';

/**
 * Counters for one enrichment run, merged with cache-wide counts.
 *
 * @invariant processed === matched + notFound + errored + skipped
 * @invariant processed === cacheHits + networkLookups + skipped
 */
export interface EnrichmentStats extends CacheStats {
  processed: number;
  matched: number;
  notFound: number;
  errored: number;

  /** Entities left unresolved because the daily call budget ran out */
  skipped: number;

  cacheHits: number;
  networkLookups: number;

  /** Network calls made by the fetcher in this process */
  callsMade: number;
  callsRemaining: number;
}

/**
 * Snapshot passed to progress listeners.
 */
export interface EnrichmentProgress {
  processed: number;
  total: number;
  matched: number;
  callsRemaining: number;
}

export interface EnrichmentResult {
  /** Matched metadata in rank order */
  enriched: EnrichedMetadata[];

  /** Titles skipped because the call budget was exhausted */
  skipped: string[];

  stats: EnrichmentStats;

  /** True when the run stopped early on an abort signal */
  cancelled: boolean;
}
