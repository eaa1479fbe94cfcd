/**
 * @fileoverview Run context management using AsyncLocalStorage.
 * Every log entry written while a pipeline run is in progress carries the
 * run's id without it being threaded through every call.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Run context structure
 */
export interface RunContext {
  /** Unique run identifier (UUID v4) */
  run_id: string;

  [key: string]: unknown;
}

const runContextStorage = new AsyncLocalStorage<RunContext>();

/**
 * Generate a new unique run ID (UUID v4 format)
 */
export function generateRunId(): string {
  return randomUUID();
}

/**
 * Get the current run ID, or undefined outside of a run.
 *
 * @example
 * ```typescript
 * logger.info('Cache opened', { run_id: getRunId() });
 * ```
 */
export function getRunId(): string | undefined {
  return runContextStorage.getStore()?.run_id;
}

/**
 * Execute a function within a new run context.
 * The run ID is propagated through all async operations started inside `fn`.
 *
 * @param fn - Function to execute within the run context
 * @param runId - Run ID to use (generated when omitted)
 * @param additionalContext - Extra fields stored alongside the run ID
 *
 * @example
 * ```typescript
 * await withRunContext(async () => {
 *   await runPipeline(config, deps);
 * }, undefined, { command: 'enrich' });
 * ```
 */
export async function withRunContext<T>(
  fn: () => Promise<T> | T,
  runId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RunContext = {
    ...additionalContext,
    run_id: runId || generateRunId(),
  };

  return runContextStorage.run(context, fn);
}
