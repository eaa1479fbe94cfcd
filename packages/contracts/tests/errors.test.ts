/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  BoxOfficeError,
  ConfigurationError,
  InputFileNotFoundError,
  CachePersistenceError,
  CacheLockedError,
  isBoxOfficeError,
  isConfigurationError,
  isInputFileNotFoundError,
  isCachePersistenceError,
  isCacheLockedError,
} from '../src/errors.js';

describe('BoxOfficeError', () => {
  it('should create error with code and message', () => {
    const error = new BoxOfficeError('TEST_CODE', 'Test message');

    expect(error.name).toBe('BoxOfficeError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.timestamp).toBeDefined();
    expect(error.stack).toBeDefined();
  });

  it('should include optional data', () => {
    const data = { foo: 'bar', count: 42 };
    const error = new BoxOfficeError('TEST_CODE', 'Test message', data);

    expect(error.data).toEqual(data);
  });

  it('should have valid ISO timestamp', () => {
    const error = new BoxOfficeError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should be JSON stringifiable', () => {
    const error = new BoxOfficeError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed = JSON.parse(JSON.stringify(error));

    expect(parsed.name).toBe('BoxOfficeError');
    expect(parsed.code).toBe('TEST_CODE');
    expect(parsed.message).toBe('Test message');
    expect(parsed.data).toEqual({ key: 'value' });
    expect(parsed.timestamp).toBe(error.timestamp);
  });
});

describe('fatal pipeline errors', () => {
  it('ConfigurationError carries the offending setting', () => {
    const error = new ConfigurationError('OMDB_API_KEY is not set', { setting: 'omdb.apiKey' });

    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe('CONFIGURATION_INVALID');
    expect(error.data?.['setting']).toBe('omdb.apiKey');
  });

  it('InputFileNotFoundError names the path', () => {
    const error = new InputFileNotFoundError('data/raw/revenues_per_day.csv');

    expect(error.code).toBe('INPUT_FILE_NOT_FOUND');
    expect(error.path).toBe('data/raw/revenues_per_day.csv');
    expect(error.message).toBe('Input file not found: data/raw/revenues_per_day.csv');
  });

  it('CachePersistenceError keeps the key that failed', () => {
    const error = new CachePersistenceError('write failed', {
      path: '/tmp/cache.json',
      key: 'heat|1995',
      cause: 'EACCES',
    });

    expect(error.code).toBe('CACHE_PERSISTENCE_FAILED');
    expect(error.data).toEqual({ path: '/tmp/cache.json', key: 'heat|1995', cause: 'EACCES' });
  });

  it('CacheLockedError mentions the owning pid', () => {
    const error = new CacheLockedError({
      path: '/tmp/cache.json',
      lockPath: '/tmp/cache.json.lock',
      ownerPid: 4242,
    });

    expect(error.code).toBe('CACHE_LOCKED');
    expect(error.message).toBe('Cache file /tmp/cache.json is locked by another process (pid 4242)');
  });
});

describe('Type Guards', () => {
  const baseError = new BoxOfficeError('TEST', 'message');
  const configError = new ConfigurationError('message');
  const inputError = new InputFileNotFoundError('missing.csv');
  const persistenceError = new CachePersistenceError('message', { path: 'cache.json' });
  const lockedError = new CacheLockedError({ path: 'cache.json', lockPath: 'cache.json.lock' });
  const nativeError = new Error('native');

  it('isBoxOfficeError accepts every subclass', () => {
    expect(isBoxOfficeError(baseError)).toBe(true);
    expect(isBoxOfficeError(configError)).toBe(true);
    expect(isBoxOfficeError(inputError)).toBe(true);
    expect(isBoxOfficeError(persistenceError)).toBe(true);
    expect(isBoxOfficeError(lockedError)).toBe(true);
  });

  it('isBoxOfficeError rejects other values', () => {
    expect(isBoxOfficeError(nativeError)).toBe(false);
    expect(isBoxOfficeError({ code: 'FAKE' })).toBe(false);
    expect(isBoxOfficeError(null)).toBe(false);
    expect(isBoxOfficeError(undefined)).toBe(false);
  });

  it('narrow guards match only their own class', () => {
    expect(isConfigurationError(configError)).toBe(true);
    expect(isConfigurationError(baseError)).toBe(false);
    expect(isInputFileNotFoundError(inputError)).toBe(true);
    expect(isInputFileNotFoundError(configError)).toBe(false);
    expect(isCachePersistenceError(persistenceError)).toBe(true);
    expect(isCachePersistenceError(lockedError)).toBe(false);
    expect(isCacheLockedError(lockedError)).toBe(true);
    expect(isCacheLockedError(nativeError)).toBe(false);
  });
});
