/**
 * @fileoverview Canonical timeframes shared by every package.
 *
 * Values use the compact notation of the candle feed ("1m", "4h", "1D").
 * Providers translate these into their own interval codes; see
 * `@candlefeed/market-data-core` for the per-provider tables.
 *
 * @module @candlefeed/contracts/timeframes
 */

/**
 * Candle intervals the feed understands.
 *
 * Minutes use a lowercase `m`, months an uppercase `M`.
 */
export type Timeframe =
  | '1m'
  | '2m'
  | '3m'
  | '5m'
  | '15m'
  | '30m'
  | '45m'
  | '1h'
  | '90m'
  | '2h'
  | '3h'
  | '4h'
  | '1D'
  | '1W'
  | '1M';

/**
 * Duration of each timeframe in minutes.
 *
 * @invariant Keys are listed from shortest to longest
 */
const TIMEFRAME_MINUTES: Readonly<Record<Timeframe, number>> = {
  '1m': 1,
  '2m': 2,
  '3m': 3,
  '5m': 5,
  '15m': 15,
  '30m': 30,
  '45m': 45,
  '1h': 60,
  '90m': 90,
  '2h': 120,
  '3h': 180,
  '4h': 240,
  '1D': 1_440,
  '1W': 10_080,
  '1M': 43_200,
};

/** Minutes in one calendar day. */
export const MINUTES_PER_DAY = 1_440;

/**
 * Checks whether a string is a canonical timeframe.
 *
 * @example
 * ```typescript
 * isTimeframe('2m')   // true
 * isTimeframe('2min') // false (see parseTimeframe in market-data-core)
 * ```
 */
export function isTimeframe(value: string): value is Timeframe {
  return Object.prototype.hasOwnProperty.call(TIMEFRAME_MINUTES, value);
}

/**
 * Duration of a timeframe in minutes.
 *
 * @example
 * ```typescript
 * timeframeToMinutes('4h') // 240
 * timeframeToMinutes('1D') // 1440
 * ```
 */
export function timeframeToMinutes(timeframe: Timeframe): number {
  return TIMEFRAME_MINUTES[timeframe];
}

/**
 * Finds the canonical timeframe with exactly the given duration.
 *
 * @returns The timeframe, or undefined when no canonical value matches
 */
export function timeframeFromMinutes(minutes: number): Timeframe | undefined {
  return getAllTimeframes().find((tf) => TIMEFRAME_MINUTES[tf] === minutes);
}

/**
 * Orders two timeframes by duration.
 *
 * @returns Negative if a is shorter than b, positive if longer, zero if equal
 */
export function compareTimeframes(a: Timeframe, b: Timeframe): number {
  return TIMEFRAME_MINUTES[a] - TIMEFRAME_MINUTES[b];
}

/**
 * All canonical timeframes, shortest first.
 */
export function getAllTimeframes(): Timeframe[] {
  return Object.keys(TIMEFRAME_MINUTES).filter(isTimeframe);
}
