/**
 * Timeframe resolution and fetch planning.
 *
 * This module provides functions for:
 * - Parsing loose timeframe notations ("2min", "60m", "D") into minutes
 * - Mapping a requested timeframe onto what a provider actually serves
 * - Sizing the bar budget and lookback period for a request
 * - Building the ordered list of fetch attempts for one request
 *
 * Interval tables are static and shared read-only by every request.
 */

import {
  MINUTES_PER_DAY,
  timeframeFromMinutes,
  type FetchPlan,
  type ProviderInterval,
  type ProviderKind,
  type ResolvedQuery,
  type Timeframe,
} from '@candlefeed/contracts';

/**
 * Trading session length assumed when sizing intraday bar budgets.
 *
 * 540 minutes covers the regular futures session of the default venue.
 */
export const DEFAULT_SESSION_MINUTES = 540;

/** Timeframe used when a request cannot be parsed. */
export const DEFAULT_TIMEFRAME: Timeframe = '1m';

const CHART_SESSION_INTERVALS: readonly ProviderInterval[] = [
  { timeframe: '1m', code: '1', minutes: 1 },
  { timeframe: '3m', code: '3', minutes: 3 },
  { timeframe: '5m', code: '5', minutes: 5 },
  { timeframe: '15m', code: '15', minutes: 15 },
  { timeframe: '30m', code: '30', minutes: 30 },
  { timeframe: '45m', code: '45', minutes: 45 },
  { timeframe: '1h', code: '1H', minutes: 60 },
  { timeframe: '2h', code: '2H', minutes: 120 },
  { timeframe: '3h', code: '3H', minutes: 180 },
  { timeframe: '4h', code: '4H', minutes: 240 },
  { timeframe: '1D', code: '1D', minutes: 1_440 },
  { timeframe: '1W', code: '1W', minutes: 10_080 },
  { timeframe: '1M', code: '1M', minutes: 43_200 },
];

const TICKER_HISTORY_INTERVALS: readonly ProviderInterval[] = [
  { timeframe: '1m', code: '1m', minutes: 1 },
  { timeframe: '2m', code: '2m', minutes: 2 },
  { timeframe: '5m', code: '5m', minutes: 5 },
  { timeframe: '15m', code: '15m', minutes: 15 },
  { timeframe: '30m', code: '30m', minutes: 30 },
  { timeframe: '1h', code: '60m', minutes: 60 },
  { timeframe: '90m', code: '90m', minutes: 90 },
  { timeframe: '1D', code: '1d', minutes: 1_440 },
  { timeframe: '1W', code: '1wk', minutes: 10_080 },
  { timeframe: '1M', code: '1mo', minutes: 43_200 },
];

/**
 * Supported intervals per provider, shortest first.
 *
 * Invariants:
 * - Every table is non-empty and sorted by minutes ascending
 * - Every table contains the 1D interval used by fallback plans
 */
export const PROVIDER_INTERVALS: Readonly<Record<ProviderKind, readonly ProviderInterval[]>> = {
  tradingview: CHART_SESSION_INTERVALS,
  yahoo: TICKER_HISTORY_INTERVALS,
  scrape: CHART_SESSION_INTERVALS,
};

/**
 * Unit aliases, lower-cased, in minutes.
 * A bare uppercase "M" means months and is handled before lookup.
 */
const UNIT_MINUTES: Record<string, number> = {
  '': 1,
  m: 1,
  min: 1,
  mins: 1,
  minute: 1,
  minutes: 1,
  h: 60,
  hr: 60,
  hour: 60,
  hours: 60,
  d: MINUTES_PER_DAY,
  day: MINUTES_PER_DAY,
  days: MINUTES_PER_DAY,
  daily: MINUTES_PER_DAY,
  w: 7 * MINUTES_PER_DAY,
  wk: 7 * MINUTES_PER_DAY,
  week: 7 * MINUTES_PER_DAY,
  weekly: 7 * MINUTES_PER_DAY,
  mo: 30 * MINUTES_PER_DAY,
  mon: 30 * MINUTES_PER_DAY,
  month: 30 * MINUTES_PER_DAY,
  monthly: 30 * MINUTES_PER_DAY,
};

/**
 * Parses a loose timeframe notation into minutes.
 *
 * @param input - Timeframe as typed by a user or a provider ("2m", "2min", "1H", "D", "1wk")
 * @returns Duration in minutes, or undefined when the input cannot be read
 *
 * @example
 * ```typescript
 * parseTimeframeMinutes('2min') // 2
 * parseTimeframeMinutes('60m')  // 60
 * parseTimeframeMinutes('D')    // 1440
 * parseTimeframeMinutes('1M')   // 43200 (month)
 * parseTimeframeMinutes('15')   // 15 (bare numbers are minutes)
 * parseTimeframeMinutes('abc')  // undefined
 * ```
 *
 * Edge cases:
 * - "M" (uppercase, alone or after a number) is a month; "m" is a minute
 * - Zero or negative amounts are rejected
 */
export function parseTimeframeMinutes(input: string): number | undefined {
  const match = /^(\d+)?\s*([a-zA-Z]*)$/.exec(input.trim());
  if (!match) {
    return undefined;
  }

  const amountText = match[1];
  const unitText = match[2] ?? '';
  if (amountText === undefined && unitText === '') {
    return undefined;
  }

  const amount = amountText === undefined ? 1 : Number.parseInt(amountText, 10);
  if (amount <= 0) {
    return undefined;
  }

  const unit = unitText === 'M' ? 30 * MINUTES_PER_DAY : UNIT_MINUTES[unitText.toLowerCase()];
  return unit === undefined ? undefined : amount * unit;
}

/**
 * Parses a loose timeframe notation into a canonical timeframe.
 *
 * @returns The canonical timeframe, or undefined when the duration has none
 *
 * @example
 * ```typescript
 * parseTimeframe('2min') // '2m'
 * parseTimeframe('60m')  // '1h'
 * parseTimeframe('1d')   // '1D'
 * parseTimeframe('7m')   // undefined
 * ```
 */
export function parseTimeframe(input: string): Timeframe | undefined {
  const minutes = parseTimeframeMinutes(input);
  return minutes === undefined ? undefined : timeframeFromMinutes(minutes);
}

/**
 * Maps a requested timeframe onto an interval the provider serves.
 *
 * Selection rules, in order:
 * 1. Exact match on duration
 * 2. The longest supported interval not longer than the request
 * 3. The shortest supported interval (request finer than anything served)
 *
 * Unparseable requests resolve to the provider's default ("1m").
 *
 * @example
 * ```typescript
 * resolveInterval('2m', 'tradingview') // { timeframe: '1m', code: '1', minutes: 1 }
 * resolveInterval('2m', 'yahoo')       // { timeframe: '2m', code: '2m', minutes: 2 }
 * resolveInterval('1h', 'yahoo')       // { timeframe: '1h', code: '60m', minutes: 60 }
 * resolveInterval('10m', 'tradingview') // { timeframe: '5m', code: '5', minutes: 5 }
 * ```
 *
 * Complexity: O(n) in the size of the provider table
 */
export function resolveInterval(
  requested: string,
  provider: ProviderKind,
  table: readonly ProviderInterval[] = PROVIDER_INTERVALS[provider]
): ProviderInterval {
  const shortest = table[0];
  if (!shortest) {
    throw new Error(`No intervals configured for provider: ${provider}`);
  }

  const minutes = parseTimeframeMinutes(requested);
  if (minutes === undefined) {
    return table.find((interval) => interval.timeframe === DEFAULT_TIMEFRAME) ?? shortest;
  }

  let best: ProviderInterval | undefined;
  for (const interval of table) {
    if (interval.minutes <= minutes && (!best || interval.minutes > best.minutes)) {
      best = interval;
    }
  }

  return best ?? shortest;
}

/**
 * Options for barBudget.
 */
export interface BarBudgetOptions {
  /** Provider cap on bars per request */
  maxBars: number;

  /** Trading minutes per day (default: 540) */
  sessionMinutes?: number;
}

/**
 * Number of bars needed to cover a lookback window.
 *
 * Intraday: `min(days * max(1, floor(sessionMinutes / intervalMinutes)), maxBars)`.
 * Daily and longer: `min(ceil(days / intervalDays), maxBars)`.
 *
 * @example
 * ```typescript
 * barBudget(7, { timeframe: '1m', code: '1', minutes: 1 }, { maxBars: 5000 })  // 3780
 * barBudget(30, { timeframe: '1m', code: '1', minutes: 1 }, { maxBars: 5000 }) // 5000
 * barBudget(10, { timeframe: '1W', code: '1W', minutes: 10080 }, { maxBars: 5000 }) // 2
 * ```
 *
 * Edge cases:
 * - Fractional or non-positive lookbacks count as at least one day
 * - The result is always at least 1
 */
export function barBudget(lookbackDays: number, interval: ProviderInterval, options: BarBudgetOptions): number {
  const days = Math.max(1, Math.ceil(lookbackDays));
  const sessionMinutes = options.sessionMinutes ?? DEFAULT_SESSION_MINUTES;

  let bars: number;
  if (interval.minutes >= MINUTES_PER_DAY) {
    bars = Math.ceil(days / (interval.minutes / MINUTES_PER_DAY));
  } else {
    const barsPerDay = Math.max(1, Math.floor(sessionMinutes / interval.minutes));
    bars = days * barsPerDay;
  }

  return Math.max(1, Math.min(bars, options.maxBars));
}

/**
 * Lookback ranges of the ticker-history provider, shortest first.
 */
const HISTORY_PERIODS: ReadonlyArray<{ code: string; days: number }> = [
  { code: '1d', days: 1 },
  { code: '5d', days: 5 },
  { code: '1mo', days: 30 },
  { code: '3mo', days: 90 },
  { code: '6mo', days: 180 },
  { code: '1y', days: 365 },
  { code: '2y', days: 730 },
  { code: '5y', days: 1_825 },
  { code: '10y', days: 3_650 },
  { code: 'max', days: Number.POSITIVE_INFINITY },
];

/**
 * How far back the ticker-history provider keeps intraday data, by interval minutes.
 */
function historyLimitDays(intervalMinutes: number): number {
  if (intervalMinutes < 2) return 7;
  if (intervalMinutes < 60) return 60;
  if (intervalMinutes < MINUTES_PER_DAY) return 730;
  return Number.POSITIVE_INFINITY;
}

/**
 * Smallest ticker-history range covering the lookback, capped by the
 * interval's intraday history limit.
 *
 * @example
 * ```typescript
 * selectHistoryPeriod(7, resolveInterval('1m', 'yahoo'))   // '5d' (1m data only goes back 7 days)
 * selectHistoryPeriod(7, resolveInterval('2m', 'yahoo'))   // '1mo'
 * selectHistoryPeriod(120, resolveInterval('5m', 'yahoo')) // '1mo' (capped at 60 days)
 * selectHistoryPeriod(400, resolveInterval('1D', 'yahoo')) // '2y'
 * ```
 */
export function selectHistoryPeriod(lookbackDays: number, interval: ProviderInterval): string {
  const limit = historyLimitDays(interval.minutes);
  const allowed = HISTORY_PERIODS.filter((period) => period.days <= limit);
  const covering = allowed.find((period) => period.days >= lookbackDays);
  const chosen = covering ?? allowed[allowed.length - 1] ?? HISTORY_PERIODS[0];
  return chosen ? chosen.code : '1d';
}

/** Shortest period and the interval of the ticker-history fallback attempt. */
export const FALLBACK_PERIOD = '1mo';
export const FALLBACK_TIMEFRAME: Timeframe = '1D';

/**
 * Period for the ticker-history fallback: the next range longer than the
 * primary one, and never shorter than {@link FALLBACK_PERIOD}.
 *
 * @returns undefined when no longer range exists
 *
 * @example
 * ```typescript
 * selectFallbackPeriod('5d')  // { code: '1mo', days: 30 }
 * selectFallbackPeriod('1mo') // { code: '3mo', days: 90 }
 * selectFallbackPeriod('2y')  // { code: '5y', days: 1825 }
 * selectFallbackPeriod('max') // undefined
 * ```
 */
export function selectFallbackPeriod(primaryPeriod: string): { code: string; days: number } | undefined {
  const primaryDays = HISTORY_PERIODS.find((period) => period.code === primaryPeriod)?.days ?? 0;
  const minimumDays = HISTORY_PERIODS.find((period) => period.code === FALLBACK_PERIOD)?.days ?? 0;
  return HISTORY_PERIODS.find((period) => period.days > primaryDays && period.days >= minimumDays);
}

/**
 * Inputs for buildFetchPlan.
 */
export interface FetchPlanRequest {
  provider: ProviderKind;
  providerSymbol: string;
  exchange?: string;
  requestedTimeframe: string;
  lookbackDays: number;
  windowSize: number;
  maxBarsPerRequest: number;
  sessionMinutes?: number;
  sourceUrl?: string;
  frontContract?: number;
}

/**
 * Builds the ordered fetch attempts for one request.
 *
 * - Chart-session and scrape providers get a single attempt
 * - The ticker-history provider gets the primary (period, interval) and a
 *   daily fallback over the next longer period (at least 1mo), unless the
 *   primary already uses the longest one
 *
 * The window is clamped to the provider's bar cap.
 *
 * @example
 * ```typescript
 * const plan = buildFetchPlan({
 *   provider: 'yahoo',
 *   providerSymbol: '^BVSP',
 *   requestedTimeframe: '2m',
 *   lookbackDays: 7,
 *   windowSize: 100,
 *   maxBarsPerRequest: 5000
 * });
 * // plan.attempts.map(a => [a.period, a.interval.code]) → [['1mo', '2m'], ['3mo', '1d']]
 * ```
 */
export function buildFetchPlan(request: FetchPlanRequest): FetchPlan {
  const interval = resolveInterval(request.requestedTimeframe, request.provider);
  const budgetOptions: BarBudgetOptions = { maxBars: request.maxBarsPerRequest };
  if (request.sessionMinutes !== undefined) {
    budgetOptions.sessionMinutes = request.sessionMinutes;
  }

  const base = {
    provider: request.provider,
    providerSymbol: request.providerSymbol,
    ...(request.exchange !== undefined && { exchange: request.exchange }),
    ...(request.sourceUrl !== undefined && { sourceUrl: request.sourceUrl }),
    ...(request.frontContract !== undefined && { frontContract: request.frontContract }),
  };

  const primary: ResolvedQuery = {
    ...base,
    interval,
    barCount: barBudget(request.lookbackDays, interval, budgetOptions),
    ...(request.provider === 'yahoo' && { period: selectHistoryPeriod(request.lookbackDays, interval) }),
  };

  const attempts: ResolvedQuery[] = [primary];

  const fallback = primary.period !== undefined ? selectFallbackPeriod(primary.period) : undefined;
  if (fallback) {
    const daily = resolveInterval(FALLBACK_TIMEFRAME, request.provider);
    attempts.push({
      ...base,
      interval: daily,
      barCount: barBudget(fallback.days, daily, budgetOptions),
      period: fallback.code,
    });
  }

  return {
    attempts,
    windowSize: Math.max(0, Math.min(Math.floor(request.windowSize), request.maxBarsPerRequest)),
  };
}
