/**
 * @fileoverview Budgeted, retrying metadata lookups.
 *
 * MetadataFetcher owns the process-wide call counter and the retry policy.
 * It never reads or writes the cache.
 *
 * @module @boxoffice/provider-omdb/fetcher
 */

import { createSilentLogger, type Logger } from '@boxoffice/logger';
import { AuthenticationError, DailyLimitError, OmdbError, isRetryableError } from './errors.js';
import type { FetchOutcome, MetadataFetcherOptions, MetadataLookup, OmdbLookupResponse } from './types.js';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_DAILY_LIMIT = 1000;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wraps a MetadataLookup with a call ceiling and linear retry backoff.
 *
 * Every attempt counts against the ceiling, retries included. The ceiling
 * is checked before each attempt; once it is reached, or the service
 * reports its own daily limit, every later resolve returns
 * `budget_exhausted` without network activity.
 *
 * @example
 * ```typescript
 * const fetcher = new MetadataFetcher(new OmdbClient({ apiKey }), { dailyLimit: 1000 });
 * const outcome = await fetcher.resolve('Heat', 1995);
 * switch (outcome.kind) {
 *   case 'matched': ...
 *   case 'not_found': ...
 *   case 'error': ...
 *   case 'budget_exhausted': ...
 * }
 * ```
 */
export class MetadataFetcher {
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly dailyLimit: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  private callCount = 0;
  private exhausted = false;

  constructor(
    private readonly client: MetadataLookup,
    options: MetadataFetcherOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.dailyLimit = options.dailyLimit ?? DEFAULT_DAILY_LIMIT;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'omdb-fetcher' });
  }

  /** Network calls made so far */
  get callsMade(): number {
    return this.callCount;
  }

  get callsRemaining(): number {
    return this.exhausted ? 0 : Math.max(0, this.dailyLimit - this.callCount);
  }

  get budgetExhausted(): boolean {
    return this.callsRemaining === 0;
  }

  /**
   * Resolves one title.
   *
   * @throws AuthenticationError when the API key is rejected
   */
  async resolve(title: string, year?: number): Promise<FetchOutcome> {
    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (this.budgetExhausted) {
        return this.exhaust(title);
      }

      this.callCount += 1;

      let response: OmdbLookupResponse;
      try {
        response = await this.client.lookup(title, year);
      } catch (error) {
        if (!(error instanceof OmdbError) || error instanceof AuthenticationError) {
          throw error;
        }

        if (error instanceof DailyLimitError) {
          return this.exhaust(title);
        }

        if (!isRetryableError(error)) {
          this.logger.warn('Lookup failed permanently', {
            title,
            attempt,
            error_code: error.code,
            reason: error.message,
          });
          return { kind: 'error', reason: error.message };
        }

        lastReason = error.message;
        this.logger.warn('Lookup attempt failed', {
          title,
          attempt,
          maxAttempts: this.maxAttempts,
          error_code: error.code,
          reason: error.message,
        });
        await this.backoff(attempt);
        continue;
      }

      switch (response.type) {
        case 'match':
          this.logger.debug('Lookup matched', { title, attempt });
          return { kind: 'matched', metadata: response.metadata };

        case 'not_found':
          this.logger.info('Title not found', { title, year });
          return { kind: 'not_found' };

        case 'malformed':
          lastReason = `Malformed OMDb response: ${response.reason}`;
          this.logger.warn('Lookup attempt returned a malformed response', {
            title,
            attempt,
            maxAttempts: this.maxAttempts,
            reason: response.reason,
          });
          await this.backoff(attempt);
          break;
      }
    }

    this.logger.error('All lookup attempts failed', { title, attempts: this.maxAttempts, reason: lastReason });
    return { kind: 'error', reason: lastReason };
  }

  /**
   * Linear backoff: waits attempt * retryDelayMs when another attempt will
   * follow and the budget allows it.
   */
  private async backoff(attempt: number): Promise<void> {
    if (attempt < this.maxAttempts && !this.budgetExhausted) {
      await this.sleep(this.retryDelayMs * attempt);
    }
  }

  private exhaust(title: string): FetchOutcome {
    if (!this.exhausted) {
      this.exhausted = true;
      this.logger.warn('Daily API limit reached', { dailyLimit: this.dailyLimit, callsMade: this.callCount, title });
    }
    return { kind: 'budget_exhausted' };
  }
}
