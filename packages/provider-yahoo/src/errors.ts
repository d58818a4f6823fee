/**
 * @fileoverview Transport error mapping for the ticker-history provider.
 *
 * @module @candlefeed/provider-yahoo/errors
 */

import axios from 'axios';
import { ProviderError, isProviderError } from '@candlefeed/contracts';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function describeBody(data: unknown): string | undefined {
  if (typeof data === 'string') {
    return data;
  }
  if (data && typeof data === 'object' && 'chart' in data) {
    const chart = data.chart;
    if (chart && typeof chart === 'object' && 'error' in chart) {
      const err = chart.error;
      if (err && typeof err === 'object' && 'description' in err && typeof err.description === 'string') {
        return err.description;
      }
    }
  }
  return undefined;
}

/**
 * Maps an HTTP failure to a ProviderError.
 *
 * - 404 or a "Not Found" body → unsupported-symbol
 * - 401 / 403 → authentication
 * - request timed out → timeout
 * - no response at all → network
 * - anything else → protocol
 *
 * @example
 * ```typescript
 * try {
 *   await http.get(url);
 * } catch (error) {
 *   throw mapHttpError(error, 'PETR4.SA');
 * }
 * ```
 */
export function mapHttpError(error: unknown, symbol: string): ProviderError {
  if (isProviderError(error)) {
    return error;
  }

  if (!axios.isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(`Yahoo request failed for ${symbol}: ${message}`, {
      provider: 'yahoo',
      reason: 'network',
      symbol,
    });
  }

  if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
    return new ProviderError(`Yahoo request timed out for ${symbol}`, {
      provider: 'yahoo',
      reason: 'timeout',
      symbol,
    });
  }

  const response = error.response;
  if (!response) {
    return new ProviderError(`Yahoo request failed for ${symbol}: ${error.message}`, {
      provider: 'yahoo',
      reason: 'network',
      symbol,
      code: error.code,
    });
  }

  const statusCode = response.status;
  const body = describeBody(response.data);

  if (statusCode === 404 || (body !== undefined && /not found/i.test(body))) {
    return new ProviderError(`Symbol ${symbol} not found on Yahoo`, {
      provider: 'yahoo',
      reason: 'unsupported-symbol',
      statusCode,
      symbol,
    });
  }

  if (statusCode === 401 || statusCode === 403) {
    return new ProviderError(`Yahoo rejected the request for ${symbol} (HTTP ${statusCode})`, {
      provider: 'yahoo',
      reason: 'authentication',
      statusCode,
      symbol,
    });
  }

  return new ProviderError(`Yahoo returned HTTP ${statusCode} for ${symbol}`, {
    provider: 'yahoo',
    reason: 'protocol',
    statusCode,
    symbol,
    ...(body !== undefined && { body }),
  });
}
