/**
 * Raw bar normalization.
 *
 * Converts provider-native rows into canonical, classified candles. Field
 * names are matched case-insensitively against a small alias table so every
 * adapter can hand over its rows without renaming.
 */

import { MalformedBarError, type Candle, type RawBar } from '@candlefeed/contracts';
import { classifyCandle } from './classify.js';
import type { DroppedBar, NormalizeOptions, NormalizeResult } from './types.js';

type PriceField = 'open' | 'high' | 'low' | 'close' | 'volume';

/**
 * Accepted field names per canonical field, lower-case.
 */
const FIELD_ALIASES: Readonly<Record<PriceField, readonly string[]>> = {
  open: ['open', 'o', '1. open'],
  high: ['high', 'h', '2. high'],
  low: ['low', 'l', '3. low'],
  close: ['close', 'c', 'last', '4. close'],
  volume: ['volume', 'v', 'vol', '5. volume'],
};

/**
 * Numbers below this are epoch seconds; at or above, epoch milliseconds.
 * 1e11 seconds is year 5138, 1e11 milliseconds is March 1973.
 */
const EPOCH_SECONDS_LIMIT = 1e11;

/** ISO date and time without an offset; read as UTC, not host time. */
const ZONELESS_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

function lookupField(fields: Record<string, unknown>, field: PriceField): unknown {
  const aliases = FIELD_ALIASES[field];
  for (const [key, value] of Object.entries(fields)) {
    if (aliases.includes(key.trim().toLowerCase())) {
      return value;
    }
  }
  return undefined;
}

/**
 * Coerces a number or numeric string to a finite number.
 */
function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const cleaned = value.trim().replace(/,/g, '');
    if (cleaned === '') {
      return undefined;
    }
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Converts any supported timestamp representation to ISO 8601.
 *
 * @returns ISO string, or undefined when the value is not a valid instant
 */
export function toIsoTimestamp(value: Date | string | number): string | undefined {
  let date: Date;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'number') {
    date = fromEpoch(value);
  } else {
    const trimmed = value.trim();
    if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
      date = fromEpoch(Number(trimmed));
    } else if (ZONELESS_DATE_TIME.test(trimmed)) {
      date = new Date(`${trimmed.replace(' ', 'T')}Z`);
    } else {
      date = new Date(trimmed);
    }
  }

  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

function fromEpoch(value: number): Date {
  return new Date(Math.abs(value) < EPOCH_SECONDS_LIMIT ? value * 1000 : value);
}

function roundTo(value: number, decimals: number | undefined): number {
  if (decimals === undefined) {
    return value;
  }
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Normalizes and classifies a single raw bar.
 *
 * @throws {MalformedBarError} If the timestamp, open or close is unusable
 *
 * @example
 * ```typescript
 * normalizeBar(
 *   { timestamp: 1736946000, fields: { o: '100', h: 110, l: 90, c: 108, v: 1200 } },
 *   { policy: REVERSAL_POLICY }
 * );
 * // → { timestamp: '2025-01-15T13:00:00.000Z', open: 100, high: 110, low: 90,
 * //     close: 108, volume: 1200, candle_type: 'reversal' }
 * ```
 */
export function normalizeBar(raw: RawBar, options: NormalizeOptions): Candle {
  const timestamp = toIsoTimestamp(raw.timestamp);
  if (timestamp === undefined) {
    throw new MalformedBarError(`Unresolvable timestamp: ${String(raw.timestamp)}`, {
      timestamp: String(raw.timestamp),
    });
  }

  const open = toFiniteNumber(lookupField(raw.fields, 'open'));
  const close = toFiniteNumber(lookupField(raw.fields, 'close'));
  if (open === undefined || close === undefined) {
    throw new MalformedBarError(`Bar at ${timestamp} is missing ${open === undefined ? 'open' : 'close'}`, {
      timestamp,
    });
  }

  const high = toFiniteNumber(lookupField(raw.fields, 'high')) ?? Math.max(open, close);
  const low = toFiniteNumber(lookupField(raw.fields, 'low')) ?? Math.min(open, close);

  const rawVolume = toFiniteNumber(lookupField(raw.fields, 'volume'));
  const volume = rawVolume === undefined || rawVolume < 0 ? 0 : Math.round(rawVolume);

  const decimals = options.priceDecimals;
  const candle = {
    timestamp,
    open: roundTo(open, decimals),
    high: roundTo(high, decimals),
    low: roundTo(low, decimals),
    close: roundTo(close, decimals),
    volume,
  };

  return {
    ...candle,
    candle_type: classifyCandle(candle.open, candle.high, candle.low, candle.close, options.policy),
  };
}

/**
 * Normalizes a batch of raw bars, dropping the ones that cannot be used.
 *
 * Provider order is preserved. A dropped bar never affects its neighbours.
 *
 * @example
 * ```typescript
 * const { candles, dropped } = normalizeBars(rawBars, { policy, priceDecimals: 2 });
 * logger.debug('Normalized bars', { kept: candles.length, dropped: dropped.length });
 * ```
 */
export function normalizeBars(rawBars: readonly RawBar[], options: NormalizeOptions): NormalizeResult {
  const candles: Candle[] = [];
  const dropped: DroppedBar[] = [];

  for (const raw of rawBars) {
    try {
      candles.push(normalizeBar(raw, options));
    } catch (error) {
      dropped.push({
        bar: raw,
        error: error instanceof Error ? error : new MalformedBarError(String(error)),
      });
    }
  }

  return { candles, dropped };
}
