/**
 * @fileoverview Winston formats: secret redaction, standard fields and
 * pretty output.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Field names whose values never reach a transport.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/** Winston's own keys, left untouched by redaction */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Returns a copy of `value` with sensitive keys replaced, at any depth.
 *
 * @example
 * ```typescript
 * redactValue({ provider: 'tradingview', authToken: 'abc' });
 * // { provider: 'tradingview', authToken: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(nested, seen);
  }
  return result;
}

/**
 * Redacts sensitive metadata. Must run before any output format.
 *
 * @example
 * ```typescript
 * logger.info('Provider ready', { provider: 'tradingview', authToken: 'abc' });
 * // {"level":"info","message":"Provider ready","provider":"tradingview","authToken":"[REDACTED]"}
 * ```
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Timestamp, error stacks and the active request id.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/** Fields printed first, in this order, by {@link prettyPrint} */
const LEADING_FIELDS = ['component', 'provider', 'symbol', 'timeframe', 'request_id'];

const SKIPPED_FIELDS = new Set(['level', 'message', 'timestamp', 'stack', 'splat', ...LEADING_FIELDS]);

/**
 * Single-line colorized output for development.
 *
 * @example
 * ```typescript
 * // [2025-01-15T13:00:00.000-03:00] info: Fetch attempt succeeded component=pipeline provider=yahoo bars=270
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const context: string[] = [];

    for (const key of LEADING_FIELDS) {
      const value = info[key];
      if (value !== undefined && value !== null && value !== '') {
        context.push(`${key}=${String(value)}`);
      }
    }

    for (const [key, value] of Object.entries(info)) {
      if (!SKIPPED_FIELDS.has(key)) {
        context.push(`${key}=${JSON.stringify(value)}`);
      }
    }

    const suffix = context.length > 0 ? ` ${context.join(' ')}` : '';
    const line = `[${String(info['timestamp'])}] ${info.level}: ${String(info.message)}${suffix}`;

    const stack = info['stack'];
    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);
