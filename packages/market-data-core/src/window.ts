/**
 * Response window limiting.
 */

/**
 * Keeps the most recent `n` elements of a chronologically ordered sequence.
 *
 * @param sequence - Elements in ascending time order
 * @param n - Window size
 * @returns The last `n` elements, in order
 *
 * @example
 * ```typescript
 * limitWindow([a, b, c, d], 2) // [c, d]
 * limitWindow([a, b], 5)       // [a, b] (same reference)
 * limitWindow([a, b], 0)       // []
 * ```
 *
 * Edge cases:
 * - n <= 0 or NaN: empty result
 * - n >= length: the input is returned unchanged
 * - Fractional n is floored
 *
 * Properties: idempotent, never grows the sequence.
 */
export function limitWindow<T>(sequence: readonly T[], n: number): readonly T[] {
  const size = Math.floor(n);
  if (!(size > 0)) {
    return [];
  }
  if (sequence.length <= size) {
    return sequence;
  }
  return sequence.slice(-size);
}
