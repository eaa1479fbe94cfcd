/**
 * @fileoverview Public API exports for @boxoffice/logger
 * Structured logging and fatal-error handling for the enrichment pipeline
 */

// Core logger creation
export { createLogger, createSilentLogger } from './createLogger.js';

// Formats
export { redactPII, standardFields, prettyPrint, isSensitiveKey, scrubSecrets } from './formats.js';

// Global error handlers
export { attachGlobalHandlers, gracefulExit } from './errorHandler.js';

// Run context management
export { generateRunId, getRunId, withRunContext } from './run-context.js';

// Performance timing utilities
export { startTimer, StageTimings } from './perf-timer.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel } from './types.js';
export type { RunContext } from './run-context.js';
export type { PerfTimer } from './perf-timer.js';
