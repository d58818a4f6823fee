/**
 * Shared types for candle normalization and classification.
 */

import type { Candle, RawBar } from '@candlefeed/contracts';

/**
 * Labels a classification policy assigns.
 *
 * `reversal` is optional: policies without it fall back to the weak label
 * for bodies between the doji and weak thresholds.
 */
export interface ClassificationLabels {
  degenerate: string;
  bullStrong: string;
  bullWeak: string;
  bearStrong: string;
  bearWeak: string;
  reversal?: string;
}

/**
 * Body-to-range thresholds and labels for the candle classifier.
 *
 * Invariants:
 * - All thresholds lie in [0, 1]
 * - dojiThreshold <= weakThreshold <= strongThreshold
 */
export interface ClassificationPolicy {
  name: string;
  dojiThreshold: number;
  weakThreshold: number;
  strongThreshold: number;
  labels: ClassificationLabels;
}

/**
 * Threshold overrides applied on top of a named policy.
 */
export type PolicyOverrides = Partial<
  Pick<ClassificationPolicy, 'dojiThreshold' | 'weakThreshold' | 'strongThreshold'>
> & {
  labels?: Partial<ClassificationLabels>;
};

/**
 * Options for normalizeBars / normalizeBar.
 */
export interface NormalizeOptions {
  policy: ClassificationPolicy;

  /**
   * Decimal places prices are rounded to.
   * Omit for point-valued quotes, which are passed through unrounded.
   */
  priceDecimals?: number;
}

/**
 * A raw bar the normalizer refused, with the reason.
 */
export interface DroppedBar {
  bar: RawBar;
  error: Error;
}

/**
 * Result of normalizing a batch of raw bars.
 */
export interface NormalizeResult {
  candles: Candle[];
  dropped: DroppedBar[];
}
