/**
 * @fileoverview Tests for window limiting.
 */

import { describe, it, expect } from 'vitest';
import { limitWindow } from '../src/window.js';

describe('limitWindow', () => {
  const sequence = [1, 2, 3, 4, 5];

  it('should keep the most recent elements in order', () => {
    expect(limitWindow(sequence, 2)).toEqual([4, 5]);
  });

  it('should return the sequence unchanged when it fits', () => {
    expect(limitWindow(sequence, 5)).toBe(sequence);
    expect(limitWindow(sequence, 100)).toBe(sequence);
  });

  it('should return nothing for non-positive sizes', () => {
    expect(limitWindow(sequence, 0)).toEqual([]);
    expect(limitWindow(sequence, -3)).toEqual([]);
    expect(limitWindow(sequence, Number.NaN)).toEqual([]);
  });

  it('should be idempotent and never grow', () => {
    for (let n = 0; n <= 7; n++) {
      const once = limitWindow(sequence, n);
      expect(limitWindow(once, n)).toEqual(once);
      expect(once.length).toBeLessThanOrEqual(sequence.length);
    }
  });

  it('should floor fractional sizes', () => {
    expect(limitWindow(sequence, 2.9)).toEqual([4, 5]);
  });
});
