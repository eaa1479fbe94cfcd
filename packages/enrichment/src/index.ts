/**
 * @fileoverview Public API exports for @boxoffice/enrichment
 *
 * @module @boxoffice/enrichment
 */

export { extractYearHint } from './year-hint.js';
export { EnrichmentOrchestrator, DEFAULT_PROGRESS_INTERVAL } from './orchestrator.js';
export type { EnrichmentOrchestratorConfig, EnrichmentRunOptions, MetadataResolver } from './orchestrator.js';
