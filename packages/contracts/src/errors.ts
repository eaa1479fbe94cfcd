/**
 * @fileoverview Error taxonomy for the box-office enrichment pipeline.
 *
 * Every error the pipeline raises on purpose extends BoxOfficeError and
 * carries a machine-readable code, a structured data payload and an ISO
 * timestamp. The subclasses defined here are the fatal (run-aborting)
 * failures: bad configuration, a missing input file, a cache that cannot
 * be persisted or is held by another process. Transient lookup failures
 * are modelled in @boxoffice/provider-omdb and never escape the fetcher.
 *
 * @module @boxoffice/contracts/errors
 */

/**
 * Base error class for all pipeline errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new BoxOfficeError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class BoxOfficeError extends Error {
  /**
   * Machine-readable error code (e.g., 'CACHE_PERSISTENCE_FAILED').
   */
  readonly code: string;

  /**
   * Structured context for logs. Shape varies by subclass.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'BoxOfficeError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Raised when configuration is invalid or a required credential is missing.
 */
export class ConfigurationError extends BoxOfficeError {
  constructor(message: string, data?: { issues?: string[]; setting?: string; [key: string]: unknown }) {
    super('CONFIGURATION_INVALID', message, data);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the revenue input file does not exist.
 */
export class InputFileNotFoundError extends BoxOfficeError {
  readonly path: string;

  constructor(path: string) {
    super('INPUT_FILE_NOT_FOUND', `Input file not found: ${path}`, { path });
    this.name = 'InputFileNotFoundError';
    this.path = path;
  }
}

/**
 * Raised when a cache write could not be made durable.
 *
 * Never swallowed: a lost write would cause a duplicate, budgeted network
 * call on a later run.
 */
export class CachePersistenceError extends BoxOfficeError {
  constructor(message: string, data: { path: string; key?: string; cause?: string }) {
    super('CACHE_PERSISTENCE_FAILED', message, data);
    this.name = 'CachePersistenceError';
  }
}

/**
 * Raised when another live process holds the cache lock.
 */
export class CacheLockedError extends BoxOfficeError {
  constructor(data: { path: string; lockPath: string; ownerPid?: number }) {
    super(
      'CACHE_LOCKED',
      `Cache file ${data.path} is locked by another process` +
        (data.ownerPid !== undefined ? ` (pid ${data.ownerPid})` : ''),
      data
    );
    this.name = 'CacheLockedError';
  }
}

/**
 * Type guard for BoxOfficeError.
 */
export function isBoxOfficeError(error: unknown): error is BoxOfficeError {
  return error instanceof BoxOfficeError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isInputFileNotFoundError(error: unknown): error is InputFileNotFoundError {
  return error instanceof InputFileNotFoundError;
}

export function isCachePersistenceError(error: unknown): error is CachePersistenceError {
  return error instanceof CachePersistenceError;
}

export function isCacheLockedError(error: unknown): error is CacheLockedError {
  return error instanceof CacheLockedError;
}
