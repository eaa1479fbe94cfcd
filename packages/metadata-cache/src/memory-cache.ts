import type { CacheEntry, CacheStats } from '@boxoffice/contracts';
import { summarizeCache } from './stats.js';
import type { MetadataCache } from './types.js';

/**
 * Non-durable MetadataCache backed by a Map.
 *
 * @example
 * ```typescript
 * const cache = new MemoryMetadataCache();
 * await cache.put('heat|1995', { kind: 'not_found', title: 'Heat', storedAt: new Date().toISOString() });
 * ```
 */
export class MemoryMetadataCache implements MetadataCache {
  private readonly store: Map<string, CacheEntry>;

  constructor(initial: Iterable<[string, CacheEntry]> = []) {
    this.store = new Map(initial);
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

  async put(key: string, entry: CacheEntry): Promise<void> {
    if (!this.store.has(key)) {
      this.store.set(key, entry);
    }
  }

  entries(): IterableIterator<[string, CacheEntry]> {
    return this.store.entries();
  }

  stats(): CacheStats {
    return summarizeCache(this.store.values());
  }
}
