/**
 * @fileoverview Public API exports for @boxoffice/provider-omdb
 *
 * @module @boxoffice/provider-omdb
 */

export { OmdbClient, DEFAULT_OMDB_BASE_URL, DEFAULT_OMDB_TIMEOUT_MS } from './client.js';
export {
  MetadataFetcher,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_DAILY_LIMIT,
} from './fetcher.js';
export { classifyOmdbResponse, parseMetadata, optionalText, safeParseInt, safeParseFloat } from './parser.js';
export {
  OmdbError,
  ApiError,
  TimeoutError,
  NetworkError,
  AuthenticationError,
  DailyLimitError,
  mapOmdbError,
  mapOmdbErrorMessage,
  isRetryableError,
} from './errors.js';

export type {
  OmdbLookupResponse,
  MetadataLookup,
  OmdbClientOptions,
  FetchOutcome,
  MetadataFetcherOptions,
} from './types.js';
