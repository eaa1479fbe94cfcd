/**
 * Main exports for @boxoffice/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary } from './config/index.js';
export type { Config, ConfigOverrides, LoadConfigOptions } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';

// Pipeline exports
export { runPipeline } from './pipeline.js';
export type { PipelineDeps, PipelineReport, WarehouseReport } from './pipeline.js';

// CLI exports
export { parseArgs, USAGE } from './args.js';
export type { ParsedArgs, RunFlags } from './args.js';
export { start, VERSION, EXIT_SUCCESS, EXIT_FATAL, EXIT_USAGE } from './start.js';
export type { StartOptions } from './start.js';
