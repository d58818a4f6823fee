/**
 * @fileoverview Main entry point for @candlefeed/contracts.
 *
 * Shared types, the provider contract and the error taxonomy.
 *
 * @module @candlefeed/contracts
 */

// Timeframes
export type { Timeframe } from './timeframes.js';
export {
  MINUTES_PER_DAY,
  isTimeframe,
  timeframeToMinutes,
  timeframeFromMinutes,
  compareTimeframes,
  getAllTimeframes,
} from './timeframes.js';

// Market data types and provider contract
export type {
  ProviderKind,
  Candle,
  CandleSequence,
  RawBar,
  ProviderInterval,
  ResolvedQuery,
  FetchPlan,
  ProviderCapabilities,
  MarketDataProvider,
} from './market.js';

// Error classes and guards
export type { ProviderFailureReason } from './errors.js';
export {
  CandleFeedError,
  ProviderError,
  MalformedBarError,
  RequestValidationError,
  ConfigurationError,
  isCandleFeedError,
  isProviderError,
  isMalformedBarError,
} from './errors.js';
