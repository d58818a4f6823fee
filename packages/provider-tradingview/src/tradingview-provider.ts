/**
 * @fileoverview Chart-session historical bar provider.
 *
 * @module @candlefeed/provider-tradingview
 */

import type {
  MarketDataProvider,
  ProviderCapabilities,
  RawBar,
  ResolvedQuery,
} from '@candlefeed/contracts';
import type { Logger } from '@candlefeed/logger';
import { PROVIDER_INTERVALS } from '@candlefeed/market-data-core';
import { ChartSessionClient, type ChartSessionClientOptions } from './client.js';

export const DEFAULT_EXCHANGE = 'BMFBOVESPA';

/** Largest bar count a single series request returns. */
export const MAX_BARS_PER_REQUEST = 5000;

export interface TradingViewProviderOptions extends ChartSessionClientOptions {
  /** Exchange used when the query names none */
  exchange?: string;
  /** Reuse an existing client; the connection options above are then ignored */
  client?: ChartSessionClient;
  logger?: Logger;
}

/**
 * Appends the front-contract marker to a futures root.
 *
 * @example
 * ```typescript
 * applyFrontContract('WIN', 1)   // 'WIN1!'
 * applyFrontContract('WIN1!', 2) // 'WIN1!' (already continuous)
 * applyFrontContract('PETR4')    // 'PETR4'
 * ```
 */
export function applyFrontContract(ticker: string, frontContract?: number): string {
  if (frontContract === undefined || /\d!$/.test(ticker)) {
    return ticker;
  }
  return `${ticker}${frontContract}!`;
}

/**
 * Historical bar provider over the chart-session websocket.
 *
 * Prices are index points and are not rounded.
 */
export class TradingViewProvider implements MarketDataProvider {
  readonly kind = 'tradingview' as const;

  private readonly client: ChartSessionClient;
  private readonly exchange: string;
  private readonly logger?: Logger;

  constructor(options: TradingViewProviderOptions = {}) {
    this.client = options.client ?? new ChartSessionClient(options);
    this.exchange = options.exchange ?? DEFAULT_EXCHANGE;
    this.logger = options.logger;
  }

  capabilities(): ProviderCapabilities {
    return {
      kind: this.kind,
      supportsTimeframes: PROVIDER_INTERVALS.tradingview.map((interval) => interval.timeframe),
      maxBarsPerRequest: MAX_BARS_PER_REQUEST,
      requiresAuthentication: false,
    };
  }

  /**
   * Fetches `query.barCount` bars of `EXCHANGE:TICKER` at the query interval.
   */
  async fetchBars(query: ResolvedQuery): Promise<RawBar[]> {
    const ticker = applyFrontContract(query.providerSymbol, query.frontContract);
    const symbol = `${query.exchange ?? this.exchange}:${ticker}`;
    const barCount = Math.max(1, Math.min(query.barCount, MAX_BARS_PER_REQUEST));

    this.logger?.debug('Requesting chart series', {
      provider_symbol: symbol,
      interval: query.interval.code,
      bar_count: barCount,
    });

    return this.client.fetchSeries({ symbol, intervalCode: query.interval.code, barCount });
  }
}
