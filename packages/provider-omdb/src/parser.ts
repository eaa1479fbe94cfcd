/**
 * @fileoverview OMDb response classification and field normalization.
 *
 * Converts the loosely typed JSON body into an OmdbLookupResponse. Nothing
 * untyped leaves this module.
 *
 * @module @boxoffice/provider-omdb/parser
 */

import type { EnrichedMetadata } from '@boxoffice/contracts';
import { mapOmdbErrorMessage } from './errors.js';
import type { OmdbLookupResponse } from './types.js';

/** OMDb's "not applicable" sentinel */
const NOT_APPLICABLE = 'N/A';

const INTEGER = /^-?\d+$/;
const FLOAT = /^-?\d+(\.\d+)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * String field, or null when absent, blank or "N/A".
 */
export function optionalText(body: Record<string, unknown>, key: string): string | null {
  const value = body[key];
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' || trimmed === NOT_APPLICABLE ? null : trimmed;
}

/**
 * Parses an integer, returning null for anything that is not one.
 */
export function safeParseInt(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();
  return INTEGER.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * Parses a decimal number, returning null for anything that is not one.
 */
export function safeParseFloat(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();
  return FLOAT.test(trimmed) ? Number.parseFloat(trimmed) : null;
}

/**
 * Normalizes a match body into EnrichedMetadata.
 */
export function parseMetadata(body: Record<string, unknown>, title: string, now: Date): EnrichedMetadata {
  const votes = optionalText(body, 'imdbVotes');

  return {
    title,
    year: optionalText(body, 'Year'),
    rated: optionalText(body, 'Rated'),
    released: optionalText(body, 'Released'),
    runtime: optionalText(body, 'Runtime'),
    genre: optionalText(body, 'Genre'),
    director: optionalText(body, 'Director'),
    actors: optionalText(body, 'Actors'),
    plot: optionalText(body, 'Plot'),
    language: optionalText(body, 'Language'),
    country: optionalText(body, 'Country'),
    awards: optionalText(body, 'Awards'),
    posterUrl: optionalText(body, 'Poster'),
    metascore: safeParseInt(optionalText(body, 'Metascore')),
    imdbRating: safeParseFloat(optionalText(body, 'imdbRating')),
    // "1,234,567" -> 1234567
    imdbVotes: safeParseInt(votes === null ? null : votes.replace(/,/g, '')),
    imdbId: optionalText(body, 'imdbID'),
    boxOffice: optionalText(body, 'BoxOffice'),
    enrichedAt: now.toISOString(),
    resultKind: 'match',
  };
}

/**
 * Classifies a parsed OMDb body.
 *
 * @throws AuthenticationError when the body reports an invalid or missing key
 * @throws DailyLimitError when the body reports the request limit was reached
 *
 * @example
 * ```typescript
 * classifyOmdbResponse({ Response: 'False', Error: 'Movie not found!' });
 * // { type: 'not_found', message: 'Movie not found!' }
 *
 * classifyOmdbResponse({ Response: 'True', Title: 'Heat', Year: '1995', Metascore: 'N/A' });
 * // { type: 'match', metadata: { title: 'Heat', year: '1995', metascore: null, ... } }
 * ```
 */
export function classifyOmdbResponse(body: unknown, now: Date = new Date()): OmdbLookupResponse {
  if (!isRecord(body)) {
    return { type: 'malformed', reason: 'body is not a JSON object' };
  }

  if (body['Response'] === 'False') {
    const message = typeof body['Error'] === 'string' ? body['Error'] : 'Movie not found!';
    const error = mapOmdbErrorMessage(message);
    if (error) {
      throw error;
    }
    return { type: 'not_found', message };
  }

  const title = optionalText(body, 'Title');
  if (title === null) {
    return { type: 'malformed', reason: 'missing Title' };
  }

  return { type: 'match', metadata: parseMetadata(body, title, now) };
}
