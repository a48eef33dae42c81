import type { FacilityRollup, FlaggedRecord } from "./types";

/** Per-facility totals, keyed in order of first appearance. */
export function aggregateFacilities(
  records: readonly FlaggedRecord[]
): ReadonlyMap<string, FacilityRollup> {
  const buckets = new Map<
    string,
    { total: number; count: number; anomalyCount: number }
  >();
  for (const r of records) {
    const b = buckets.get(r.facility) ?? {
      total: 0,
      count: 0,
      anomalyCount: 0,
    };
    b.total += r.value;
    b.count += 1;
    if (r.isAnomaly) b.anomalyCount += 1;
    buckets.set(r.facility, b);
  }

  const out = new Map<string, FacilityRollup>();
  for (const [facility, b] of buckets) {
    out.set(facility, {
      total: b.total,
      average: b.total / b.count,
      anomalyCount: b.anomalyCount,
    });
  }
  return out;
}
