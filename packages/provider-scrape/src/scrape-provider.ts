/**
 * @fileoverview Page-scrape provider.
 *
 * Least reliable source: a page that renders its chart client-side yields
 * no text to parse, which is reported as zero bars rather than an error.
 *
 * @module @candlefeed/provider-scrape
 */

import {
  ProviderError,
  isProviderError,
  type MarketDataProvider,
  type ProviderCapabilities,
  type RawBar,
  type ResolvedQuery,
} from '@candlefeed/contracts';
import type { Logger } from '@candlefeed/logger';
import { PROVIDER_INTERVALS } from '@candlefeed/market-data-core';
import { HttpPageRenderer } from './http-renderer.js';
import type { PageRenderer } from './renderer.js';
import { parsePageText } from './text-parser.js';

export const DEFAULT_CHART_URL = 'https://www.tradingview.com/chart/';

export interface ScrapeProviderOptions {
  renderer?: PageRenderer;
  /** Milliseconds to wait after the page opens before reading it (default: 3000) */
  settleMs?: number;
  /** Chart page used when the query carries no URL */
  defaultUrl?: string;
  /** Exchange prefix used in the default URL (default: BMFBOVESPA) */
  exchange?: string;
  logger?: Logger;
  /** Delay implementation, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
  /** Clock for legend bars, replaceable in tests */
  now?: () => Date;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Builds the chart page URL for a symbol and interval code.
 *
 * @example
 * ```typescript
 * buildChartUrl('https://www.tradingview.com/chart/', 'BMFBOVESPA', 'WIN1!', '1')
 * // 'https://www.tradingview.com/chart/?symbol=BMFBOVESPA%3AWIN1%21&interval=1'
 * ```
 */
export function buildChartUrl(baseUrl: string, exchange: string, symbol: string, intervalCode: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('symbol', `${exchange}:${symbol}`);
  url.searchParams.set('interval', intervalCode);
  return url.toString();
}

export class ScrapeProvider implements MarketDataProvider {
  readonly kind = 'scrape' as const;

  private readonly renderer: PageRenderer;
  private readonly settleMs: number;
  private readonly defaultUrl: string;
  private readonly exchange: string;
  private readonly logger?: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(options: ScrapeProviderOptions = {}) {
    this.renderer = options.renderer ?? new HttpPageRenderer();
    this.settleMs = options.settleMs ?? 3000;
    this.defaultUrl = options.defaultUrl ?? DEFAULT_CHART_URL;
    this.exchange = options.exchange ?? 'BMFBOVESPA';
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  capabilities(): ProviderCapabilities {
    return {
      kind: this.kind,
      supportsTimeframes: PROVIDER_INTERVALS.scrape.map((interval) => interval.timeframe),
      maxBarsPerRequest: 500,
      requiresAuthentication: false,
    };
  }

  /**
   * Opens the chart page, waits for it to settle and parses its text.
   *
   * @throws {ProviderError} network when the page cannot be loaded
   */
  async fetchBars(query: ResolvedQuery): Promise<RawBar[]> {
    const url =
      query.sourceUrl ??
      buildChartUrl(this.defaultUrl, query.exchange ?? this.exchange, query.providerSymbol, query.interval.code);

    let text: string;
    try {
      const page = await this.renderer.open(url);
      try {
        await this.sleep(this.settleMs);
        text = await page.text();
      } finally {
        await page.close();
      }
    } catch (error) {
      if (isProviderError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Could not load chart page ${url}: ${message}`, {
        provider: 'scrape',
        reason: 'network',
        url,
      });
    }

    const bars = parsePageText(text, this.now());
    this.logger?.debug('Scraped chart page', { url, characters: text.length, bars: bars.length });
    return bars;
  }
}
