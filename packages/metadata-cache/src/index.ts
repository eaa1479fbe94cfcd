/**
 * @fileoverview Public API exports for @boxoffice/metadata-cache
 *
 * @module @boxoffice/metadata-cache
 */

export { makeCacheKey, normalizeTitle } from './cache-key.js';
export { summarizeCache } from './stats.js';
export { MemoryMetadataCache } from './memory-cache.js';
export { JsonFileMetadataCache } from './json-file-cache.js';
export { CacheEntrySchema, EnrichedMetadataSchema } from './schema.js';

export type { MetadataCache, JsonFileCacheOptions } from './types.js';
