/**
 * Error sanitization utilities for safe logging
 */

import { isCandleFeedError } from '@candlefeed/contracts';

/**
 * Reduces an error to fields that are safe to log or return
 *
 * Stack traces are included in development or when asked for. Candle feed
 * errors keep their code and data; provider details stay server-side.
 */
export function sanitizeError(error: unknown, includeStack = false): Record<string, unknown> {
  const isDevelopment = process.env['NODE_ENV'] === 'development';

  if (error instanceof Error) {
    const sanitized: Record<string, unknown> = {
      message: error.message,
      name: error.name,
    };

    if (isCandleFeedError(error)) {
      sanitized['code'] = error.code;
      if (error.data) {
        sanitized['data'] = error.data;
      }
    }

    if ((isDevelopment || includeStack) && error.stack) {
      sanitized['stack'] = error.stack;
    }

    return sanitized;
  }

  return {
    message: String(error),
    name: 'Unknown',
  };
}
