/**
 * Application entry point
 * Parses flags, loads configuration and runs the pipeline inside a run
 * context so every log entry carries the run id.
 */

import { isBoxOfficeError } from '@boxoffice/contracts';
import {
  attachGlobalHandlers,
  createLogger,
  withRunContext,
  type Logger,
} from '@boxoffice/logger';
import { parseArgs, USAGE } from './args.js';
import { getConfigSummary, loadConfig, type Config } from './config/index.js';
import { runPipeline, type PipelineDeps, type PipelineReport } from './pipeline.js';

export const VERSION = '0.1.0';

/** Process exit codes */
export const EXIT_SUCCESS = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export interface StartOptions {
  /** @default process.env */
  env?: NodeJS.ProcessEnv;

  /** Replaces the logger built from configuration */
  logger?: Logger;

  /** Substituted into the pipeline */
  deps?: Omit<PipelineDeps, 'logger' | 'signal'>;

  /** Listen for SIGINT and SIGTERM to cancel enrichment; off in tests */
  handleSignals?: boolean;
}

function describeError(error: unknown): Record<string, unknown> {
  if (isBoxOfficeError(error)) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

function summarize(report: PipelineReport): Record<string, unknown> {
  return {
    data_quality: report.dataQuality,
    ranked: report.ranked,
    ranked_revenue: report.rankedRevenue,
    enrichment: report.enrichment,
    skipped: report.skipped.length,
    cancelled: report.cancelled,
    revenues_loaded: report.warehouse?.revenuesLoaded,
    movies_loaded: report.warehouse?.moviesLoaded,
    validation: report.warehouse?.validation,
    timings: report.timings,
  };
}

function buildLogger(config: Config): Logger {
  return createLogger({
    level: config.app.verbose ? 'debug' : config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
}

/**
 * Runs the command line and resolves to the process exit code.
 */
export async function start(argv: readonly string[], options: StartOptions = {}): Promise<number> {
  const parsed = parseArgs(argv);

  switch (parsed.command) {
    case 'help':
      console.log(USAGE);
      return EXIT_SUCCESS;
    case 'version':
      console.log(`boxoffice-enrich v${VERSION}`);
      return EXIT_SUCCESS;
    case 'invalid':
      console.error(`${parsed.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    case 'run':
      break;
  }

  let config: Config;
  try {
    config = loadConfig({ env: options.env, overrides: parsed.flags });
  } catch (error) {
    console.error('Invalid configuration:', error instanceof Error ? error.message : String(error));
    return EXIT_FATAL;
  }

  const logger = options.logger ?? buildLogger(config);
  const detachHandlers = attachGlobalHandlers(logger);

  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals): void => {
    logger.warn('Cancellation requested, finishing current title', { signal });
    controller.abort();
  };
  if (options.handleSignals) {
    process.once('SIGINT', cancel);
    process.once('SIGTERM', cancel);
  }

  try {
    return await withRunContext(async () => {
      logger.info('Pipeline started', { ...getConfigSummary(config), operation: 'pipeline' });

      const report = await runPipeline(config, {
        ...options.deps,
        logger,
        signal: controller.signal,
      });

      logger.info('Pipeline complete', { ...summarize(report), operation: 'pipeline', result: 'success' });
      return EXIT_SUCCESS;
    });
  } catch (error) {
    logger.error('Pipeline failed', { error: describeError(error), operation: 'pipeline', result: 'error' });
    return EXIT_FATAL;
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
    detachHandlers();
  }
}
