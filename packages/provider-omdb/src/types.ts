/**
 * @fileoverview Type definitions for the OMDb provider.
 *
 * @module @boxoffice/provider-omdb/types
 */

import type { EnrichedMetadata } from '@boxoffice/contracts';
import type { Logger } from '@boxoffice/logger';

/**
 * Classified body of one OMDb lookup response.
 */
export type OmdbLookupResponse =
  | { type: 'match'; metadata: EnrichedMetadata }
  | { type: 'not_found'; message: string }
  | { type: 'malformed'; reason: string };

/**
 * Anything that can perform a single lookup. OmdbClient is the production
 * implementation; tests substitute scripted ones.
 */
export interface MetadataLookup {
  lookup(title: string, year?: number): Promise<OmdbLookupResponse>;
}

/**
 * Configuration options for OmdbClient.
 */
export interface OmdbClientOptions {
  apiKey: string;

  /** @default 'http://www.omdbapi.com/' */
  baseUrl?: string;

  /**
   * Per-request timeout in milliseconds.
   * @default 10000
   */
  timeoutMs?: number;

  /** Fetch implementation, defaults to the global fetch */
  fetch?: typeof fetch;

  logger?: Logger;
}

/**
 * Final result of resolving one title through MetadataFetcher.
 */
export type FetchOutcome =
  | { kind: 'matched'; metadata: EnrichedMetadata }
  | { kind: 'not_found' }
  | { kind: 'error'; reason: string }
  | { kind: 'budget_exhausted' };

/**
 * Configuration options for MetadataFetcher.
 */
export interface MetadataFetcherOptions {
  /** @default 3 */
  maxAttempts?: number;

  /**
   * Base delay of the linear backoff: attempt n waits n * retryDelayMs.
   * @default 1000
   */
  retryDelayMs?: number;

  /**
   * Maximum network calls for the lifetime of the fetcher.
   * @default 1000
   */
  dailyLimit?: number;

  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;

  logger?: Logger;
}
