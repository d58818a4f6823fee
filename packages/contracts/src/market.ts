/**
 * @fileoverview Market data types and the provider contract.
 *
 * Pure data structures with no I/O. Every provider adapter produces
 * {@link RawBar}s; the normalizer in market-data-core turns them into
 * {@link Candle}s.
 *
 * @module @candlefeed/contracts/market
 */

import type { Timeframe } from './timeframes.js';

/**
 * Upstream data provider families.
 *
 * - `tradingview`: chart-session historical-bar API (bar count based)
 * - `yahoo`: ticker-history chart API (period/interval based)
 * - `scrape`: rendered chart page, text extraction
 */
export type ProviderKind = 'tradingview' | 'yahoo' | 'scrape';

/**
 * Canonical candle emitted by the feed.
 *
 * OHLC consistency (high >= max(open, close) >= min(open, close) >= low) is
 * expected from upstream but not enforced here.
 *
 * @invariant volume is a non-negative integer
 * @invariant timestamp is an ISO 8601 string
 *
 * @example
 * ```typescript
 * const candle: Candle = {
 *   timestamp: '2025-01-15T13:00:00.000Z',
 *   open: 128450,
 *   high: 128600,
 *   low: 128300,
 *   close: 128550,
 *   volume: 15230,
 *   candle_type: 'bull-weak'
 * };
 * ```
 */
export interface Candle {
  /** ISO 8601 timestamp of the bar open (UTC) */
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  /** Label produced by the active classification policy */
  candle_type: string;
}

/** Candles in ascending timestamp order, owned by a single request. */
export type CandleSequence = readonly Candle[];

/**
 * Provider-native row before normalization.
 *
 * Field names are whatever the provider uses (`open`, `o`, `1. open`, ...);
 * values may be numbers, numeric strings, null or missing.
 */
export interface RawBar {
  /** Date object, epoch seconds/milliseconds, or a parseable date string */
  timestamp: Date | string | number;
  fields: Record<string, unknown>;
}

/**
 * A timeframe as one particular provider spells it.
 *
 * @example
 * ```typescript
 * const interval: ProviderInterval = { timeframe: '1h', code: '60m', minutes: 60 };
 * ```
 */
export interface ProviderInterval {
  readonly timeframe: Timeframe;
  /** Provider-native interval code sent upstream */
  readonly code: string;
  readonly minutes: number;
}

/**
 * One fully resolved fetch against a provider.
 *
 * Built once by the resolvers and never mutated afterwards.
 */
export interface ResolvedQuery {
  readonly provider: ProviderKind;
  /** Symbol in the provider's own notation (e.g. 'WIN1!', '^BVSP', 'PETR4.SA') */
  readonly providerSymbol: string;
  /** Exchange prefix for providers that address symbols as EXCHANGE:TICKER */
  readonly exchange?: string;
  readonly interval: ProviderInterval;
  /** Maximum number of bars to request (bar-count providers) */
  readonly barCount: number;
  /** Lookback period code (period-based providers, e.g. '5d', '1mo') */
  readonly period?: string;
  /** Chart page to render (page-scrape provider) */
  readonly sourceUrl?: string;
  /** Front contract selector for continuous futures (1 = front month) */
  readonly frontContract?: number;
}

/**
 * Ordered fetch attempts for one request.
 *
 * The first attempt is the primary query; later attempts are coarser
 * fallbacks tried only when the previous one produced no candles.
 *
 * @invariant attempts.length >= 1
 */
export interface FetchPlan {
  readonly attempts: readonly ResolvedQuery[];
  /** Number of most recent candles to return */
  readonly windowSize: number;
}

/**
 * Static description of what a provider supports.
 */
export interface ProviderCapabilities {
  readonly kind: ProviderKind;
  /** Timeframes the provider serves natively */
  readonly supportsTimeframes: readonly Timeframe[];
  /** Upper bound for bar counts and for the response window */
  readonly maxBarsPerRequest: number;
  readonly requiresAuthentication: boolean;
  /**
   * Decimal places prices are rounded to after normalization.
   * Undefined for point-valued quotes that are passed through as-is.
   */
  readonly priceDecimals?: number;
}

/**
 * The abstract "fetch bars" capability every upstream adapter implements.
 *
 * Resolves to an empty array when the provider has no data for the window;
 * rejects with a ProviderError on network, authentication or symbol failures.
 */
export interface MarketDataProvider {
  readonly kind: ProviderKind;
  capabilities(): ProviderCapabilities;
  fetchBars(query: ResolvedQuery): Promise<RawBar[]>;
}
