/**
 * Type definitions for metadata caches.
 */

import type { CacheEntry, CacheStats } from '@boxoffice/contracts';
import type { Logger } from '@boxoffice/logger';

/**
 * Key-value store of lookup outcomes.
 *
 * Entries are immutable: once a key holds an entry, `put` for that key is
 * a no-op. `put` resolves only after the entry is durable.
 */
export interface MetadataCache {
  get(key: string): CacheEntry | undefined;
  has(key: string): boolean;
  put(key: string, entry: CacheEntry): Promise<void>;
  entries(): IterableIterator<[string, CacheEntry]>;
  stats(): CacheStats;
  readonly size: number;
}

/**
 * Options for JsonFileMetadataCache.open.
 */
export interface JsonFileCacheOptions {
  /** Path of the JSON cache file; parent directories are created */
  path: string;

  logger?: Logger;

  /**
   * Liveness check for the PID found in an existing lock file.
   * Defaults to signalling the process with signal 0.
   */
  isProcessAlive?: (pid: number) => boolean;
}
