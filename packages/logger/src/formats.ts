/**
 * @fileoverview Custom winston formats for the pipeline logger.
 * Includes secret redaction, run ID injection and pretty-print output.
 */

import { format } from 'winston';
import { getRunId } from './run-context.js';

/**
 * Field names whose values are never written to a log.
 * Matches are case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
  /credential/i,
];

/**
 * Query parameters carrying credentials inside logged URLs, e.g.
 * `http://www.omdbapi.com/?apikey=abc&t=Heat`.
 */
const SENSITIVE_QUERY_PARAM = /([?&](?:apikey|api_key|key|token)=)[^&#\s"]+/gi;

const REDACTED = '[REDACTED]';

const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Replaces credential query parameters in free text.
 *
 * @example
 * ```typescript
 * scrubSecrets('GET http://www.omdbapi.com/?apikey=abc123&t=Heat');
 * // 'GET http://www.omdbapi.com/?apikey=[REDACTED]&t=Heat'
 * ```
 */
export function scrubSecrets(text: string): string {
  return text.replace(SENSITIVE_QUERY_PARAM, `$1${REDACTED}`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns a redacted copy of a log field value. Errors and class instances
 * are passed through untouched so their own serialization applies.
 */
function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return scrubSecrets(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      copy[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
    }
    return copy;
  }

  return value;
}

/**
 * Winston format that redacts sensitive fields and credential query
 * parameters. Must be applied first in the format chain.
 *
 * @example
 * ```typescript
 * logger.info('Lookup failed', { url: 'http://www.omdbapi.com/?apikey=abc&t=Heat' });
 * // {"level":"info","message":"Lookup failed","url":"http://www.omdbapi.com/?apikey=[REDACTED]&t=Heat"}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactValue(redacted[key]);
  }

  if (typeof redacted.message === 'string') {
    redacted.message = scrubSecrets(redacted.message);
  }

  return redacted;
});

/**
 * Winston format that adds the timestamp, expands Error objects and injects
 * run_id from the active run context.
 */
export const standardFields = format.combine(
  format.timestamp(),
  format.errors({ stack: true }),
  format((info) => {
    const runId = getRunId();
    if (runId && !info['run_id']) {
      info['run_id'] = runId;
    }
    return info;
  })()
);

/**
 * Winston format for human-readable output.
 *
 * @example
 * ```typescript
 * // [2025-01-15T12:34:56.789Z] info: Lookup matched component=omdb-fetcher title=Heat run_id=6f1c…
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, title, run_id, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (title) context.push(`title=${JSON.stringify(title)}`);
    if (run_id) context.push(`run_id=${String(run_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (typeof stack === 'string') {
      return `${baseMsg}\n${stack}`;
    }

    return baseMsg;
  })
);
