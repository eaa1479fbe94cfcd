/**
 * @fileoverview Movie metadata and cache entry types.
 *
 * EnrichedMetadata is the normalized, strongly typed form of a lookup
 * match. CacheEntry is the tri-state outcome persisted per lookup key.
 *
 * @module @boxoffice/contracts/metadata
 */

/**
 * Normalized movie metadata from a successful lookup.
 *
 * Every optional field is `null` when the service omitted it or reported
 * its "not applicable" sentinel.
 */
export interface EnrichedMetadata {
  title: string;
  year: string | null;
  rated: string | null;
  released: string | null;
  runtime: string | null;
  genre: string | null;
  director: string | null;
  actors: string | null;
  plot: string | null;
  language: string | null;
  country: string | null;
  awards: string | null;
  posterUrl: string | null;

  /** Critic score (0-100) */
  metascore: number | null;

  /** Audience score (0-10) */
  imdbRating: number | null;

  imdbVotes: number | null;
  imdbId: string | null;

  /** Box-office figure as reported by the service, e.g. "$534,858,444" */
  boxOffice: string | null;

  /** ISO 8601 timestamp of the lookup */
  enrichedAt: string;

  resultKind: 'match';
}

/**
 * Discriminator of a cached lookup outcome.
 */
export type CacheEntryKind = 'matched' | 'not_found' | 'error';

export interface MatchedCacheEntry {
  kind: 'matched';
  storedAt: string;
  metadata: EnrichedMetadata;
}

export interface NotFoundCacheEntry {
  kind: 'not_found';
  storedAt: string;
  title: string;
}

export interface ErrorCacheEntry {
  kind: 'error';
  storedAt: string;
  title: string;
  reason: string;
}

/**
 * Persisted outcome of a lookup. All three variants are terminal: a key
 * with any entry is never looked up over the network again.
 */
export type CacheEntry = MatchedCacheEntry | NotFoundCacheEntry | ErrorCacheEntry;

/**
 * Cache-wide counts by entry variant.
 */
export interface CacheStats {
  totalCached: number;
  cachedMatches: number;
  cachedNotFound: number;
  cachedErrors: number;
}
