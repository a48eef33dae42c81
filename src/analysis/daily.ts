import { maxOf, minOf, spread, sum } from "./stats";
import type { ConsumptionRecord } from "./types";

export type DailyStats = {
  date: string; // ISO "2024-03-01"
  sum: number;
  mean: number;
  min: number;
  max: number;
  /** Sample deviation; null for a day with a single reading. */
  std: number | null;
};

export function calculateDailyStats(
  records: readonly ConsumptionRecord[]
): DailyStats[] {
  const days = new Map<string, number[]>();
  for (const r of records) {
    const date = r.timestamp.toISODate();
    if (!date) continue;
    const vals = days.get(date) ?? [];
    vals.push(r.value);
    days.set(date, vals);
  }

  return [...days].map(([date, vals]) => {
    const total = sum(vals);
    return {
      date,
      sum: total,
      mean: total / vals.length,
      min: minOf(vals),
      max: maxOf(vals),
      std: vals.length > 1 ? spread(vals).std : null,
    };
  });
}
