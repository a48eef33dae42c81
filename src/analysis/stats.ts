import { DomainError, EmptyDatasetError } from "../errors";

export const sum = (vals: readonly number[]) => vals.reduce((a, b) => a + b, 0);

// reduce rather than Math.max(...vals): a year of hourly rows overflows
// the call stack
export const minOf = (vals: readonly number[]) =>
  vals.reduce((a, b) => (b < a ? b : a), Infinity);
export const maxOf = (vals: readonly number[]) =>
  vals.reduce((a, b) => (b > a ? b : a), -Infinity);

export function mean(vals: readonly number[]): number {
  if (!vals.length) throw new EmptyDatasetError();
  return sum(vals) / vals.length;
}

export type Spread = { mean: number; std: number };

/**
 * Mean and sample standard deviation (n - 1). A constant series, or a
 * single value, has zero spread and its mean is exactly that value.
 */
export function spread(vals: readonly number[]): Spread {
  if (!vals.length) throw new EmptyDatasetError();
  const min = minOf(vals);
  if (min === maxOf(vals)) return { mean: min, std: 0 };

  const m = mean(vals);
  const ss = vals.reduce((a, b) => a + (b - m) ** 2, 0);
  return { mean: m, std: Math.sqrt(ss / (vals.length - 1)) };
}

/** Percentile `p` in [0, 100], linear interpolation between closest ranks. */
export function percentile(vals: readonly number[], p: number): number {
  if (!vals.length) throw new EmptyDatasetError();
  if (!(p >= 0 && p <= 100)) {
    throw new DomainError(`Percentile must be within [0, 100], got ${p}`);
  }
  const sorted = [...vals].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

/**
 * Two-decimal rounding, half to even on exact ties. Only multiples of 1/8
 * can sit exactly on a tie in binary, e.g. 32.125 gives 32.12.
 */
export function round2(n: number): number {
  const scaled = n * 100;
  const r = Math.round(scaled);
  if (r - scaled === 0.5 && r % 2 !== 0 && Number.isInteger(n * 8)) {
    return (r - 1) / 100;
  }
  return r / 100;
}
