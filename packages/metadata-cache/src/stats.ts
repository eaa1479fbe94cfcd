import type { CacheEntry, CacheStats } from '@boxoffice/contracts';

/**
 * Counts entries by variant.
 */
export function summarizeCache(entries: Iterable<CacheEntry>): CacheStats {
  const stats: CacheStats = { totalCached: 0, cachedMatches: 0, cachedNotFound: 0, cachedErrors: 0 };

  for (const entry of entries) {
    stats.totalCached += 1;
    switch (entry.kind) {
      case 'matched':
        stats.cachedMatches += 1;
        break;
      case 'not_found':
        stats.cachedNotFound += 1;
        break;
      case 'error':
        stats.cachedErrors += 1;
        break;
    }
  }

  return stats;
}
