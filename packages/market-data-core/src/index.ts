/**
 * @candlefeed/market-data-core
 *
 * Pure utilities for turning provider rows into a classified candle window.
 *
 * This package provides deterministic, I/O-free functions for:
 * - Timeframe resolution against provider interval tables
 * - Bar budgets, lookback periods and fetch plans
 * - Raw bar normalization
 * - Candle classification under named policies
 * - Window limiting
 *
 * @example
 * ```typescript
 * import { buildFetchPlan, normalizeBars, limitWindow, resolvePolicy } from "@candlefeed/market-data-core";
 *
 * const plan = buildFetchPlan({ provider: 'tradingview', providerSymbol: 'WIN1!', requestedTimeframe: '2m',
 *   lookbackDays: 7, windowSize: 100, maxBarsPerRequest: 5000 });
 * const { candles } = normalizeBars(rawBars, { policy: resolvePolicy('reversal') });
 * const window = limitWindow(candles, plan.windowSize);
 * ```
 *
 * @packageDocumentation
 */

export type {
  ClassificationLabels,
  ClassificationPolicy,
  PolicyOverrides,
  NormalizeOptions,
  DroppedBar,
  NormalizeResult,
} from "./types.js";

export {
  DEFAULT_SESSION_MINUTES,
  DEFAULT_TIMEFRAME,
  PROVIDER_INTERVALS,
  FALLBACK_PERIOD,
  FALLBACK_TIMEFRAME,
  parseTimeframeMinutes,
  parseTimeframe,
  resolveInterval,
  barBudget,
  selectHistoryPeriod,
  selectFallbackPeriod,
  buildFetchPlan,
} from "./timeframe.js";
export type { BarBudgetOptions, FetchPlanRequest } from "./timeframe.js";

export {
  classificationPolicySchema,
  REVERSAL_POLICY,
  BUYER_SELLER_POLICY,
  BUILTIN_POLICIES,
  DEFAULT_POLICY_NAME,
  validatePolicy,
  resolvePolicy,
} from "./policies.js";

export { classifyCandle } from "./classify.js";

export { normalizeBar, normalizeBars, toIsoTimestamp } from "./normalize.js";

export { limitWindow } from "./window.js";
