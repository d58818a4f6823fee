/**
 * Candle classification by body-to-range ratio.
 */

import { REVERSAL_POLICY } from './policies.js';
import type { ClassificationPolicy } from './types.js';

/**
 * Labels a candle from its OHLC values.
 *
 * Algorithm:
 * 1. range = high - low; range <= 0 → degenerate label
 * 2. ratio = |close - open| / range
 * 3. ratio > strong → strong label; ratio > weak → weak label;
 *    ratio < doji → degenerate label; otherwise the reversal label
 *    (or the weak label when the policy has none)
 *
 * Direction is bullish iff close > open.
 *
 * @example
 * ```typescript
 * classifyCandle(100, 110, 90, 108) // 'reversal' (ratio 0.4)
 * classifyCandle(100, 110, 90, 109) // 'bull-weak' (ratio 0.45)
 * classifyCandle(100, 110, 90, 85)  // 'bear-strong' (ratio 0.75)
 * classifyCandle(10, 10, 10, 10)    // 'exhaustion' (flat bar)
 * ```
 *
 * Edge cases:
 * - Inconsistent OHLC (close outside [low, high]) can yield ratios above 1;
 *   those still classify as strong
 * - NaN inputs fall through every comparison to the reversal band
 *
 * Complexity: O(1)
 */
export function classifyCandle(
  open: number,
  high: number,
  low: number,
  close: number,
  policy: ClassificationPolicy = REVERSAL_POLICY
): string {
  const { labels } = policy;
  const range = high - low;
  if (range <= 0) {
    return labels.degenerate;
  }

  const ratio = Math.abs(close - open) / range;
  const bullish = close > open;

  if (ratio > policy.strongThreshold) {
    return bullish ? labels.bullStrong : labels.bearStrong;
  }
  if (ratio > policy.weakThreshold) {
    return bullish ? labels.bullWeak : labels.bearWeak;
  }
  if (ratio < policy.dojiThreshold) {
    return labels.degenerate;
  }

  return labels.reversal ?? (bullish ? labels.bullWeak : labels.bearWeak);
}
