import type { FlaggedRecord, IssueStrategy } from "../types";

export type LeakProbability = "HIGH" | "LOW";

export type LeakRiskIssues = {
  readonly anomalyCount: number;
  /**
   * Facilities with more than `AT_RISK_ABOVE` anomalous readings, in
   * order of first anomaly.
   */
  readonly facilitiesAtRisk: readonly string[];
  readonly leakProbability: LeakProbability;
};

export const AT_RISK_ABOVE = 5;

/** Water: facilities whose readings keep landing above the threshold. */
export class LeakRiskStrategy implements IssueStrategy<LeakRiskIssues> {
  readonly name = "leak_risk";

  detect(records: readonly FlaggedRecord[]): LeakRiskIssues {
    const anomalous = records.filter((r) => r.isAnomaly);

    const perFacility = new Map<string, number>();
    for (const r of anomalous) {
      perFacility.set(r.facility, (perFacility.get(r.facility) ?? 0) + 1);
    }

    const facilitiesAtRisk = [...perFacility]
      .filter(([, count]) => count > AT_RISK_ABOVE)
      .map(([facility]) => facility);

    return {
      anomalyCount: anomalous.length,
      facilitiesAtRisk,
      leakProbability: facilitiesAtRisk.length > 0 ? "HIGH" : "LOW",
    };
  }
}
