/**
 * @fileoverview Tests for raw bar normalization.
 */

import { describe, it, expect } from 'vitest';
import { MalformedBarError, type RawBar } from '@candlefeed/contracts';
import { normalizeBar, normalizeBars, toIsoTimestamp } from '../src/normalize.js';
import { REVERSAL_POLICY } from '../src/policies.js';

const options = { policy: REVERSAL_POLICY };

function bar(timestamp: RawBar['timestamp'], fields: Record<string, unknown>): RawBar {
  return { timestamp, fields };
}

describe('toIsoTimestamp', () => {
  it('should treat small numbers as epoch seconds', () => {
    expect(toIsoTimestamp(1736946000)).toBe('2025-01-15T13:00:00.000Z');
  });

  it('should treat large numbers as epoch milliseconds', () => {
    expect(toIsoTimestamp(1736946000000)).toBe('2025-01-15T13:00:00.000Z');
  });

  it('should accept dates and date strings', () => {
    expect(toIsoTimestamp(new Date('2025-01-15T13:00:00Z'))).toBe('2025-01-15T13:00:00.000Z');
    expect(toIsoTimestamp('2025-01-15T13:00:00Z')).toBe('2025-01-15T13:00:00.000Z');
    expect(toIsoTimestamp('1736946000')).toBe('2025-01-15T13:00:00.000Z');
  });

  it('should read numeric strings with the same seconds/milliseconds split as numbers', () => {
    expect(toIsoTimestamp('1736946000000')).toBe('2025-01-15T13:00:00.000Z');
    expect(toIsoTimestamp(' 1736946000000 ')).toBe('2025-01-15T13:00:00.000Z');
  });

  it('should read date times without an offset as UTC', () => {
    expect(toIsoTimestamp('2025-01-15 13:00:00')).toBe('2025-01-15T13:00:00.000Z');
    expect(toIsoTimestamp('2025-01-15T13:00')).toBe('2025-01-15T13:00:00.000Z');
    expect(toIsoTimestamp('2025-01-15T13:00:00.250')).toBe('2025-01-15T13:00:00.250Z');
    expect(toIsoTimestamp('2025-01-15T13:00:00-03:00')).toBe('2025-01-15T16:00:00.000Z');
  });

  it('should reject invalid instants', () => {
    expect(toIsoTimestamp('not a date')).toBeUndefined();
    expect(toIsoTimestamp(Number.NaN)).toBeUndefined();
  });
});

describe('normalizeBar', () => {
  it('should map short field names and classify', () => {
    expect(normalizeBar(bar(1736946000, { o: '100', h: 110, l: 90, c: 108, v: 1200 }), options)).toEqual({
      timestamp: '2025-01-15T13:00:00.000Z',
      open: 100,
      high: 110,
      low: 90,
      close: 108,
      volume: 1200,
      candle_type: 'reversal',
    });
  });

  it('should match field names case-insensitively', () => {
    const candle = normalizeBar(bar(1736946000, { Open: 1, HIGH: 2, Low: 0.5, '4. close': 1.8, Vol: 3 }), options);

    expect([candle.open, candle.high, candle.low, candle.close, candle.volume]).toEqual([1, 2, 0.5, 1.8, 3]);
  });

  it('should accept last as close', () => {
    expect(normalizeBar(bar(1736946000, { open: 10, last: 12 }), options).close).toBe(12);
  });

  it('should derive missing high and low from open and close', () => {
    const candle = normalizeBar(bar(1736946000, { open: 10, close: 12 }), options);

    expect(candle.high).toBe(12);
    expect(candle.low).toBe(10);
    expect(candle.candle_type).toBe('bull-strong');
  });

  it('should coerce volume to a non-negative integer', () => {
    expect(normalizeBar(bar(1736946000, { open: 1, close: 1, volume: 12.6 }), options).volume).toBe(13);
    expect(normalizeBar(bar(1736946000, { open: 1, close: 1, volume: -5 }), options).volume).toBe(0);
    expect(normalizeBar(bar(1736946000, { open: 1, close: 1, volume: 'n/a' }), options).volume).toBe(0);
    expect(normalizeBar(bar(1736946000, { open: 1, close: 1 }), options).volume).toBe(0);
  });

  it('should round prices when decimals are given', () => {
    const candle = normalizeBar(
      bar(1736946000, { open: 10.123, high: 10.987, low: 9.994, close: 10.5 }),
      { ...options, priceDecimals: 2 }
    );

    expect([candle.open, candle.high, candle.low, candle.close]).toEqual([10.12, 10.99, 9.99, 10.5]);
  });

  it('should leave prices unrounded without decimals', () => {
    expect(normalizeBar(bar(1736946000, { open: 10.123, close: 10.5 }), options).open).toBe(10.123);
  });

  it('should throw MalformedBarError for a missing close', () => {
    expect(() => normalizeBar(bar(1736946000, { open: 10, close: null }), options)).toThrow(MalformedBarError);
  });

  it('should throw MalformedBarError for an unusable timestamp', () => {
    expect(() => normalizeBar(bar('yesterday-ish', { open: 10, close: 11 }), options)).toThrow(MalformedBarError);
  });
});

describe('normalizeBars', () => {
  it('should drop only the bar with a missing close', () => {
    const raw = [
      bar(1736946000, { open: 1, high: 2, low: 0, close: 1.5 }),
      bar(1736946060, { open: 1.5, high: 2, low: 1, close: 1.8 }),
      bar(1736946120, { open: 1.8, high: 2.2, low: 1.7 }),
      bar(1736946180, { open: 2, high: 2.5, low: 1.9, close: 2.4 }),
      bar(1736946240, { open: 2.4, high: 2.6, low: 2.2, close: 2.3 }),
    ];

    const { candles, dropped } = normalizeBars(raw, options);

    expect(candles).toHaveLength(4);
    expect(candles.map((c) => c.timestamp)).toEqual([
      '2025-01-15T13:00:00.000Z',
      '2025-01-15T13:01:00.000Z',
      '2025-01-15T13:03:00.000Z',
      '2025-01-15T13:04:00.000Z',
    ]);
    expect(dropped).toHaveLength(1);
    expect(dropped[0]?.bar).toBe(raw[2]);
    expect(dropped[0]?.error).toBeInstanceOf(MalformedBarError);
  });

  it('should label a flat bar as degenerate', () => {
    const { candles } = normalizeBars([bar(1736946000, { o: 10, h: 10, l: 10, c: 10, v: 0 })], options);

    expect(candles).toEqual([
      {
        timestamp: '2025-01-15T13:00:00.000Z',
        open: 10,
        high: 10,
        low: 10,
        close: 10,
        volume: 0,
        candle_type: 'exhaustion',
      },
    ]);
  });

  it('should return empty results for no input', () => {
    expect(normalizeBars([], options)).toEqual({ candles: [], dropped: [] });
  });
});
