/**
 * @fileoverview High-resolution timers for logging operation durations.
 */

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start (or until stop, once stopped) */
  elapsed(): number;

  /** Freezes the timer and returns the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

/**
 * Starts a timer based on `performance.now()`.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await provider.fetchBars(query);
 * logger.info('Fetch finished', { bars: bars.length, duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,
    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },
    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },
    isRunning(): boolean {
      return endTime === null;
    },
  };
}
