import type { DateTime } from "luxon";

/** One row of the input table, keyed by column name. */
export type RawRow = Readonly<Record<string, unknown>>;

export type ConsumptionRecord = {
  readonly timestamp: DateTime;
  /** Hour of `timestamp`, 0–23. */
  readonly hour: number;
  readonly facility: string;
  /** kWh or gallons depending on the resource. */
  readonly value: number;
};

/** A record after the whole set went through anomaly and night flagging. */
export type FlaggedRecord = ConsumptionRecord & {
  readonly isAnomaly: boolean;
  /** z-score against the set mean, sign preserved. */
  readonly anomalySeverity: number;
  readonly isNightTime: boolean;
};

export type Trend =
  | "increasing"
  | "decreasing"
  | "stable"
  | "insufficient_data";

export type FacilityRollup = {
  readonly total: number;
  readonly average: number;
  readonly anomalyCount: number;
};

export type SeverityLabel = "HIGH" | "MEDIUM" | "LOW";

/**
 * Resource-specific issue detection over the fully flagged set.
 * Callers must only pass records produced by the analyzer pipeline.
 */
export interface IssueStrategy<TIssues> {
  readonly name: string;
  detect(records: readonly FlaggedRecord[], threshold: number): TIssues;
}

/** Resource-neutral figures computed before a profile renders them. */
export type AnalysisSummary<TIssues> = {
  readonly total: number;
  readonly average: number;
  readonly peak: number;
  readonly nightTotal: number;
  readonly anomalyCount: number;
  readonly threshold: number;
  readonly anomalyPercentage: number;
  readonly trend: Trend;
  readonly facilities: ReadonlyMap<string, FacilityRollup>;
  readonly issues: TIssues;
};

export type AnalyzerOptions = {
  nightHours?: Iterable<number>;
  anomalyPercentile?: number;
};

/** Returned by `analyze()` instead of throwing on an empty table. */
export type AnalysisFailure = { readonly error: string };
