/**
 * @fileoverview Main entry point for @boxoffice/contracts.
 *
 * Exports the shared domain types and the error hierarchy.
 *
 * @module @boxoffice/contracts
 */

// Revenue types
export type { RevenueObservation, RankedEntity, DataQualityReport } from './revenue.js';
export { createDataQualityReport } from './revenue.js';

// Metadata and cache types
export type {
  EnrichedMetadata,
  CacheEntry,
  CacheEntryKind,
  MatchedCacheEntry,
  NotFoundCacheEntry,
  ErrorCacheEntry,
  CacheStats,
} from './metadata.js';

// Enrichment run types
export type { EnrichmentStats, EnrichmentProgress, EnrichmentResult } from './enrichment.js';

// Error classes and guards
export {
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
} from './errors.js';
