/**
 * @fileoverview HTTP client for the OMDb API.
 *
 * One GET per lookup with a per-request timeout. The client performs no
 * retries and keeps no state; MetadataFetcher layers the call budget and
 * backoff on top of it.
 *
 * @module @boxoffice/provider-omdb/client
 */

import { ConfigurationError } from '@boxoffice/contracts';
import { createSilentLogger, type Logger } from '@boxoffice/logger';
import { NetworkError, OmdbError, TimeoutError, mapOmdbError } from './errors.js';
import { classifyOmdbResponse } from './parser.js';
import type { MetadataLookup, OmdbClientOptions, OmdbLookupResponse } from './types.js';

export const DEFAULT_OMDB_BASE_URL = 'http://www.omdbapi.com/';
export const DEFAULT_OMDB_TIMEOUT_MS = 10_000;

/**
 * OMDb API client.
 *
 * @example
 * ```typescript
 * const client = new OmdbClient({ apiKey: process.env.OMDB_API_KEY ?? '' });
 * const response = await client.lookup('Heat', 1995);
 * if (response.type === 'match') {
 *   console.log(response.metadata.director);
 * }
 * ```
 */
export class OmdbClient implements MetadataLookup {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: OmdbClientOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('OMDb API key is required', { setting: 'OMDB_API_KEY' });
    }

    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULT_OMDB_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_OMDB_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Looks up one title, optionally narrowed to a release year.
   *
   * @throws TimeoutError when no response arrives within the timeout
   * @throws NetworkError when the request fails before an HTTP status
   * @throws ApiError for HTTP error statuses
   * @throws AuthenticationError when the key is rejected
   * @throws DailyLimitError when the key's daily quota is used up
   */
  async lookup(title: string, year?: number): Promise<OmdbLookupResponse> {
    const params = new URLSearchParams({
      apikey: this.apiKey,
      t: title,
      type: 'movie',
      plot: 'short',
    });
    if (year !== undefined) {
      params.set('y', String(year));
    }

    const url = `${this.baseUrl}?${params.toString()}`;
    this.logger.debug('OMDb request', { url, title, year });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, { signal: controller.signal });
      const text = await response.text();

      if (!response.ok) {
        throw mapOmdbError(response.status, extractErrorText(text));
      }

      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch {
        return { type: 'malformed', reason: 'response body is not valid JSON' };
      }

      return classifyOmdbResponse(body);
    } catch (error) {
      if (error instanceof OmdbError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new TimeoutError(this.timeoutMs);
      }

      throw new NetworkError(error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Pulls OMDb's `Error` text out of an error response body, if it has one.
 */
function extractErrorText(text: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && 'Error' in parsed && typeof parsed.Error === 'string') {
      return parsed.Error;
    }
  } catch {
    return undefined;
  }
  return undefined;
}
