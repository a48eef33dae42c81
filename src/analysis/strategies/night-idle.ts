import { sum } from "../stats";
import type { FlaggedRecord, IssueStrategy, SeverityLabel } from "../types";

export type NightIdleIssues = {
  readonly highNightUsageCount: number;
  /** Share of all consumption that falls in the night window, 0–100. */
  readonly nightConsumptionPercentage: number;
  readonly severity: SeverityLabel;
};

// fixed breakpoints, independent of dataset size
const HIGH_ABOVE = 10;
const MEDIUM_ABOVE = 5;

export function nightIdleSeverity(count: number): SeverityLabel {
  if (count > HIGH_ABOVE) return "HIGH";
  if (count > MEDIUM_ABOVE) return "MEDIUM";
  return "LOW";
}

/** Electricity: consumption above the threshold while the site is idle. */
export class NightIdleStrategy implements IssueStrategy<NightIdleIssues> {
  readonly name = "night_idle";

  detect(
    records: readonly FlaggedRecord[],
    threshold: number
  ): NightIdleIssues {
    const night = records.filter((r) => r.isNightTime);
    const highNight = night.filter((r) => r.value > threshold);

    const total = sum(records.map((r) => r.value));
    const nightTotal = sum(night.map((r) => r.value));

    return {
      highNightUsageCount: highNight.length,
      nightConsumptionPercentage: total > 0 ? (nightTotal / total) * 100 : 0,
      severity: nightIdleSeverity(highNight.length),
    };
  }
}
