/**
 * @fileoverview Logger factory for the box-office pipeline.
 * Creates winston loggers with structured fields, secret redaction and
 * console and/or file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * Format chain: redaction first, then standard fields (timestamp, errors,
 * run_id), then JSON or pretty-print output.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Pipeline started', { topN: 800 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', filePath: './pipeline.log' });
 * const cacheLogger = logger.child({ component: 'metadata-cache' });
 * cacheLogger.debug('Cache hit', { cache_key: 'heat|1995', cache: 'hit' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // File output is always JSON, uncolored
        format: format.combine(redactPII(), standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Fatal errors are handled explicitly in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a logger that writes nothing. Used as the default when a
 * component is constructed without one.
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    level: 'error',
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}
