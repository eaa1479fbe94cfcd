/**
 * JSON file-backed metadata cache.
 *
 * The whole file is loaded into memory on open and rewritten in full after
 * every insert, through a temp file and a rename so that a crash mid-write
 * leaves the previous version intact. Call volume is bounded by the daily
 * lookup quota, which keeps full rewrites affordable.
 *
 * A `<path>.lock` file holding the owner's PID keeps a second process from
 * writing the same cache concurrently.
 */

import fs from 'node:fs';
import path from 'node:path';
import {
  CacheLockedError,
  CachePersistenceError,
  type CacheEntry,
  type CacheStats,
} from '@boxoffice/contracts';
import { createSilentLogger, type Logger } from '@boxoffice/logger';
import { CacheEntrySchema } from './schema.js';
import { summarizeCache } from './stats.js';
import type { JsonFileCacheOptions, MetadataCache } from './types.js';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Own keys are read with Object.entries, which keeps a `__proto__` key that
 * JSON.parse created as an own property.
 */
function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reports whether a process exists. EPERM means it exists but belongs to
 * another user.
 */
function defaultIsProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }
}

async function readLockOwner(lockPath: string): Promise<number | undefined> {
  let contents: string;
  try {
    contents = await fs.promises.readFile(lockPath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  const pid = Number.parseInt(contents.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : undefined;
}

async function acquireLock(
  cachePath: string,
  lockPath: string,
  isProcessAlive: (pid: number) => boolean,
  logger: Logger
): Promise<void> {
  // Second pass runs after a stale lock was removed
  for (let pass = 0; pass < 2; pass++) {
    try {
      await fs.promises.writeFile(lockPath, `${process.pid}\n`, { flag: 'wx' });
      return;
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw new CachePersistenceError(`Failed to create cache lock ${lockPath}`, {
          path: cachePath,
          cause: describe(error),
        });
      }
    }

    const ownerPid = await readLockOwner(lockPath);
    if (ownerPid !== undefined && isProcessAlive(ownerPid)) {
      throw new CacheLockedError({ path: cachePath, lockPath, ownerPid });
    }

    logger.warn('Removing stale cache lock', { lockPath, ownerPid });
    await fs.promises.rm(lockPath, { force: true });
  }

  throw new CacheLockedError({ path: cachePath, lockPath });
}

/**
 * Reads the cache file. Anything short of a readable JSON object yields an
 * empty cache; invalid entries are dropped one by one.
 */
async function loadEntries(cachePath: string, logger: Logger): Promise<Map<string, CacheEntry>> {
  const entries = new Map<string, CacheEntry>();

  let text: string;
  try {
    text = await fs.promises.readFile(cachePath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      logger.info('No existing cache file, starting empty', { path: cachePath });
    } else {
      logger.warn('Failed to read cache file, starting empty', { path: cachePath, reason: describe(error) });
    }
    return entries;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    logger.warn('Cache file is not valid JSON, starting empty', { path: cachePath, reason: describe(error) });
    return entries;
  }

  if (!isJsonObject(json)) {
    logger.warn('Cache file is not a JSON object, starting empty', { path: cachePath });
    return entries;
  }

  let dropped = 0;
  for (const [key, raw] of Object.entries(json)) {
    const entry = CacheEntrySchema.safeParse(raw);
    if (entry.success) {
      entries.set(key, entry.data);
    } else {
      dropped += 1;
      logger.warn('Dropping invalid cache entry', {
        cache_key: key,
        issues: entry.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
  }

  logger.info('Loaded metadata cache', { path: cachePath, count: entries.size, dropped });
  return entries;
}

/**
 * Durable MetadataCache stored as one pretty-printed JSON object.
 *
 * @example
 * ```typescript
 * const cache = await JsonFileMetadataCache.open({ path: 'cache/omdb_cache.json', logger });
 * try {
 *   await cache.put(makeCacheKey('Heat', 1995), { kind: 'matched', storedAt, metadata });
 * } finally {
 *   await cache.close();
 * }
 * ```
 */
export class JsonFileMetadataCache implements MetadataCache {
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly lockPath: string,
    private readonly store: Map<string, CacheEntry>,
    private readonly logger: Logger
  ) {}

  /**
   * Locks and loads the cache file.
   *
   * @throws CacheLockedError when a live process holds the lock
   * @throws CachePersistenceError when the directory or lock cannot be created
   */
  static async open(options: JsonFileCacheOptions): Promise<JsonFileMetadataCache> {
    const logger = (options.logger ?? createSilentLogger()).child({ component: 'metadata-cache' });
    const cachePath = path.resolve(options.path);
    const lockPath = `${cachePath}.lock`;

    try {
      await fs.promises.mkdir(path.dirname(cachePath), { recursive: true });
    } catch (error) {
      throw new CachePersistenceError(`Failed to create cache directory for ${cachePath}`, {
        path: cachePath,
        cause: describe(error),
      });
    }

    await acquireLock(cachePath, lockPath, options.isProcessAlive ?? defaultIsProcessAlive, logger);

    try {
      const store = await loadEntries(cachePath, logger);
      return new JsonFileMetadataCache(cachePath, lockPath, store, logger);
    } catch (error) {
      await fs.promises.rm(lockPath, { force: true });
      throw error;
    }
  }

  get size(): number {
    return this.store.size;
  }

  get(key: string): CacheEntry | undefined {
    return this.store.get(key);
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  entries(): IterableIterator<[string, CacheEntry]> {
    return this.store.entries();
  }

  stats(): CacheStats {
    return summarizeCache(this.store.values());
  }

  /**
   * Inserts an entry and rewrites the file. Existing keys are left as they
   * are.
   *
   * @throws CachePersistenceError when the file cannot be written; the
   *   in-memory insert is rolled back first
   */
  async put(key: string, entry: CacheEntry): Promise<void> {
    if (this.closed) {
      throw new CachePersistenceError('Cache is closed', { path: this.path, key });
    }

    if (this.store.has(key)) {
      this.logger.debug('Cache entry already present, not overwriting', { cache_key: key });
      return;
    }

    this.store.set(key, entry);

    try {
      await this.persist();
    } catch (error) {
      this.store.delete(key);
      throw new CachePersistenceError(`Failed to persist cache entry ${key}`, {
        path: this.path,
        key,
        cause: describe(error),
      });
    }

    this.logger.debug('Cache entry stored', { cache_key: key, kind: entry.kind });
  }

  /**
   * Releases the lock. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await fs.promises.rm(this.lockPath, { force: true });
  }

  private async persist(): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.tmp`;
    const body = `${JSON.stringify(Object.fromEntries(this.store), null, 2)}\n`;

    try {
      await fs.promises.writeFile(tempPath, body, 'utf8');
      await fs.promises.rename(tempPath, this.path);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }
}
