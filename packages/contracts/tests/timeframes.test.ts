/**
 * @fileoverview Tests for timeframe utilities.
 */

import { describe, it, expect } from 'vitest';
import {
  isTimeframe,
  timeframeToMinutes,
  timeframeFromMinutes,
  compareTimeframes,
  getAllTimeframes,
} from '../src/timeframes.js';

describe('isTimeframe', () => {
  it('should accept canonical timeframes', () => {
    expect(isTimeframe('1m')).toBe(true);
    expect(isTimeframe('2m')).toBe(true);
    expect(isTimeframe('1D')).toBe(true);
    expect(isTimeframe('1M')).toBe(true);
  });

  it('should reject other notations', () => {
    expect(isTimeframe('2min')).toBe(false);
    expect(isTimeframe('1d')).toBe(false);
    expect(isTimeframe('')).toBe(false);
    expect(isTimeframe('toString')).toBe(false);
  });
});

describe('timeframeToMinutes', () => {
  it('should convert to minutes', () => {
    expect(timeframeToMinutes('2m')).toBe(2);
    expect(timeframeToMinutes('4h')).toBe(240);
    expect(timeframeToMinutes('1D')).toBe(1440);
    expect(timeframeToMinutes('1W')).toBe(10080);
  });
});

describe('timeframeFromMinutes', () => {
  it('should find exact matches only', () => {
    expect(timeframeFromMinutes(60)).toBe('1h');
    expect(timeframeFromMinutes(90)).toBe('90m');
    expect(timeframeFromMinutes(7)).toBeUndefined();
  });
});

describe('compareTimeframes', () => {
  it('should order by duration', () => {
    expect(compareTimeframes('1m', '5m')).toBeLessThan(0);
    expect(compareTimeframes('1D', '4h')).toBeGreaterThan(0);
    expect(compareTimeframes('1h', '1h')).toBe(0);
  });
});

describe('getAllTimeframes', () => {
  it('should list shortest first', () => {
    const all = getAllTimeframes();

    expect(all[0]).toBe('1m');
    expect(all[all.length - 1]).toBe('1M');
    expect(all).toHaveLength(15);
  });
});
