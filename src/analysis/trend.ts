import { mean } from "./stats";
import type { Trend } from "./types";

/** Percent change between half means beyond which a series is trending. */
export const TREND_BAND_PERCENT = 5;

/**
 * Compares the mean of the second half of `series` with the first half,
 * split at `floor(n / 2)` in the order given. A zero first-half mean
 * counts as no change.
 */
export function trendDirection(series: readonly number[]): Trend {
  if (series.length < 2) return "insufficient_data";

  const mid = Math.floor(series.length / 2);
  const first = mean(series.slice(0, mid));
  const second = mean(series.slice(mid));
  const diffPercent = first !== 0 ? ((second - first) / first) * 100 : 0;

  if (diffPercent > TREND_BAND_PERCENT) return "increasing";
  if (diffPercent < -TREND_BAND_PERCENT) return "decreasing";
  return "stable";
}
