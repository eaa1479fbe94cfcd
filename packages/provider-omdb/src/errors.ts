/**
 * @fileoverview Error handling for the OMDb provider.
 *
 * Typed errors for lookup transport failures and the mapping from HTTP
 * status codes and OMDb error texts onto them. Everything except
 * AuthenticationError is absorbed by MetadataFetcher and turned into a
 * lookup outcome.
 *
 * @module @boxoffice/provider-omdb/errors
 */

import { BoxOfficeError } from '@boxoffice/contracts';

/**
 * Base error class for OMDb provider errors.
 */
export class OmdbError extends BoxOfficeError {
  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(code, message, data);
    this.name = 'OmdbError';
  }
}

/**
 * HTTP-level failure. `statusCode` is undefined when the service answered
 * with something other than an HTTP error status.
 */
export class ApiError extends OmdbError {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super('OMDB_API_ERROR', message, statusCode === undefined ? undefined : { statusCode });
    this.name = 'ApiError';
  }
}

/**
 * The per-attempt timeout elapsed before a response arrived.
 */
export class TimeoutError extends OmdbError {
  constructor(public readonly timeoutMs: number) {
    super('OMDB_TIMEOUT', `Request timeout after ${timeoutMs}ms`, { timeoutMs });
    this.name = 'TimeoutError';
  }
}

/**
 * DNS, connection or socket failure before any HTTP status was received.
 */
export class NetworkError extends OmdbError {
  constructor(message: string) {
    super('OMDB_NETWORK_ERROR', message);
    this.name = 'NetworkError';
  }
}

/**
 * The API key was rejected. Fatal: retrying or continuing with the same key
 * cannot succeed.
 */
export class AuthenticationError extends OmdbError {
  constructor(message: string = 'Invalid OMDb API key') {
    super('OMDB_AUTHENTICATION_FAILED', message);
    this.name = 'AuthenticationError';
  }
}

/**
 * The service reports that the key's daily request quota is used up.
 */
export class DailyLimitError extends OmdbError {
  constructor(message: string = 'OMDb request limit reached') {
    super('OMDB_DAILY_LIMIT', message);
    this.name = 'DailyLimitError';
  }
}

/**
 * Maps an OMDb `Error` text (sent with `Response: "False"`) to a typed
 * error, or undefined when the text means an ordinary not-found.
 *
 * @example
 * ```typescript
 * mapOmdbErrorMessage('Invalid API key!');         // AuthenticationError
 * mapOmdbErrorMessage('Request limit reached!');   // DailyLimitError
 * mapOmdbErrorMessage('Movie not found!');         // undefined
 * ```
 */
export function mapOmdbErrorMessage(message: string): OmdbError | undefined {
  const normalized = message.toLowerCase();

  if (normalized.includes('invalid api key') || normalized.includes('no api key')) {
    return new AuthenticationError(message);
  }

  if (normalized.includes('request limit reached')) {
    return new DailyLimitError(message);
  }

  return undefined;
}

/**
 * Maps an HTTP error status (and the OMDb error text, when the body had
 * one) to a typed error.
 *
 * @example
 * ```typescript
 * if (!response.ok) {
 *   throw mapOmdbError(response.status, errorText);
 * }
 * ```
 */
export function mapOmdbError(statusCode: number, message?: string): OmdbError {
  const fromMessage = message === undefined ? undefined : mapOmdbErrorMessage(message);
  if (fromMessage) {
    return fromMessage;
  }

  switch (statusCode) {
    case 401:
    case 403:
      return new AuthenticationError(message ?? 'Authentication failed');
    case 500:
    case 502:
    case 503:
    case 504:
      return new ApiError(message ?? 'OMDb service unavailable', statusCode);
    default:
      return new ApiError(message ?? `HTTP error ${statusCode}`, statusCode);
  }
}

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

/**
 * Checks whether another attempt of the same lookup may succeed.
 *
 * Timeouts, connectivity failures, 429 and 5xx statuses are retryable;
 * every other failure is permanent. Malformed bodies are not errors here:
 * the client returns them as a `malformed` response, which the fetcher
 * also retries.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TimeoutError || error instanceof NetworkError) {
    return true;
  }

  if (error instanceof ApiError) {
    return (
      error.statusCode !== undefined &&
      (RETRYABLE_STATUS_CODES.has(error.statusCode) || error.statusCode >= 500)
    );
  }

  return false;
}
