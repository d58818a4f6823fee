/**
 * @fileoverview Ticker-history provider.
 *
 * Fetches bars from the chart endpoint by (range, interval). Used when the
 * chart-session source is unavailable; index and FX proxies stand in for
 * futures it does not list.
 *
 * @module @candlefeed/provider-yahoo
 */

import axios, { type AxiosInstance } from 'axios';
import type {
  MarketDataProvider,
  ProviderCapabilities,
  RawBar,
  ResolvedQuery,
} from '@candlefeed/contracts';
import type { Logger } from '@candlefeed/logger';
import { PROVIDER_INTERVALS } from '@candlefeed/market-data-core';
import { mapHttpError } from './errors.js';
import { parseChartResponse } from './parser.js';
import type { YahooChartResponse, YahooProviderOptions } from './types.js';

export const YAHOO_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Ticker-history data provider.
 *
 * @example
 * ```typescript
 * const provider = new YahooProvider({ timeoutMs: 5000 });
 * const bars = await provider.fetchBars({
 *   provider: 'yahoo',
 *   providerSymbol: 'PETR4.SA',
 *   interval: { timeframe: '5m', code: '5m', minutes: 5 },
 *   barCount: 756,
 *   period: '1mo'
 * });
 * ```
 */
export class YahooProvider implements MarketDataProvider {
  readonly kind = 'yahoo' as const;

  private readonly http: AxiosInstance;
  private readonly logger?: Logger;

  constructor(options: YahooProviderOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? YAHOO_BASE_URL,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        headers: { Accept: 'application/json' },
      });
    this.logger = options.logger;
  }

  /**
   * Describes the chart endpoint: no authentication, prices at two decimals.
   */
  capabilities(): ProviderCapabilities {
    return {
      kind: this.kind,
      supportsTimeframes: PROVIDER_INTERVALS.yahoo.map((interval) => interval.timeframe),
      maxBarsPerRequest: 5000,
      requiresAuthentication: false,
      priceDecimals: 2,
    };
  }

  /**
   * Fetches one (range, interval) window.
   *
   * @returns Raw bars, empty when the symbol has no data for the window
   * @throws {ProviderError} On HTTP, timeout or symbol failures
   */
  async fetchBars(query: ResolvedQuery): Promise<RawBar[]> {
    const symbol = query.providerSymbol;
    const params = {
      range: query.period ?? '1mo',
      interval: query.interval.code,
      includePrePost: false,
      events: 'div,splits',
    };

    this.logger?.debug('Yahoo chart request', { provider_symbol: symbol, ...params });

    let data: YahooChartResponse;
    try {
      const response = await this.http.get<YahooChartResponse>(`/${encodeURIComponent(symbol)}`, { params });
      data = response.data;
    } catch (error) {
      throw mapHttpError(error, symbol);
    }

    const bars = parseChartResponse(data, symbol);
    this.logger?.debug('Yahoo chart response', { provider_symbol: symbol, bars: bars.length });
    return bars;
  }
}
