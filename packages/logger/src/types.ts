/**
 * @fileoverview Type definitions for the pipeline logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Fatal failures that abort a run
 * - 'warn': Data-quality issues, retried lookups, corrupt cache files
 * - 'info': Pipeline steps, progress and summary statistics
 * - 'debug': Per-title cache hits and individual lookup attempts
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './pipeline.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for file transport, written in addition to console.
   * @example './pipeline.log'
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;
}

/**
 * Winston's Logger, re-exported so packages depend on @boxoffice/logger only.
 */
export type Logger = WinstonLogger;
