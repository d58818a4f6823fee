/**
 * @fileoverview Parser for chart endpoint responses.
 *
 * Turns the column-oriented chart result (one timestamp array, one array per
 * quote field) into row-oriented raw bars. Null samples are kept; the
 * normalizer decides what to drop.
 *
 * @module @candlefeed/provider-yahoo/parser
 */

import { ProviderError, type RawBar } from '@candlefeed/contracts';
import type { YahooChartResponse } from './types.js';

/**
 * Converts a chart response into raw bars.
 *
 * @param response - Parsed JSON body
 * @param symbol - Requested symbol, for error context
 * @returns Raw bars in provider order; empty when the result has no timestamps
 * @throws {ProviderError} When the body reports an error or timestamps come without quotes
 *
 * @example
 * ```typescript
 * const bars = parseChartResponse({
 *   chart: {
 *     result: [{
 *       timestamp: [1736946000],
 *       indicators: { quote: [{ open: [1], high: [2], low: [0.5], close: [1.5], volume: [100] }] }
 *     }]
 *   }
 * }, 'PETR4.SA');
 * // bars[0] → { timestamp: 1736946000, fields: { open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 } }
 * ```
 */
export function parseChartResponse(response: YahooChartResponse, symbol: string): RawBar[] {
  const chartError = response.chart?.error;
  if (chartError) {
    const description = chartError.description ?? chartError.code ?? 'Unknown chart error';
    const notFound = chartError.code === 'Not Found' || /not found|no data found|delisted/i.test(description);
    throw new ProviderError(`Yahoo chart error for ${symbol}: ${description}`, {
      provider: 'yahoo',
      reason: notFound ? 'unsupported-symbol' : 'protocol',
      symbol,
    });
  }

  const result = response.chart?.result?.[0];
  const timestamps = result?.timestamp;
  if (!result || !timestamps || timestamps.length === 0) {
    return [];
  }

  const quote = result.indicators?.quote?.[0];
  if (!quote) {
    throw new ProviderError(`Yahoo chart response for ${symbol} has timestamps but no quotes`, {
      provider: 'yahoo',
      reason: 'protocol',
      symbol,
    });
  }

  return timestamps.map((timestamp, i) => ({
    timestamp,
    fields: {
      open: quote.open?.[i] ?? null,
      high: quote.high?.[i] ?? null,
      low: quote.low?.[i] ?? null,
      close: quote.close?.[i] ?? null,
      volume: quote.volume?.[i] ?? null,
    },
  }));
}
