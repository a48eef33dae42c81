import {
  ResourceAnalyzer,
  type ResourceProfile,
} from "./engine";
import { round2 } from "./stats";
import { LeakRiskStrategy, type LeakRiskIssues } from "./strategies/leak-risk";
import {
  NightIdleStrategy,
  type NightIdleIssues,
} from "./strategies/night-idle";
import type {
  AnalyzerOptions,
  FacilityRollup,
  SeverityLabel,
  Trend,
} from "./types";

/**
 * Keys shared by both reports; names are read verbatim by prompt and
 * report formatting.
 */
type CommonFields = {
  anomalies_detected: number;
  anomaly_threshold: number;
  consumption_trend: Trend;
  anomaly_percentage: number;
};

export type ElectricityReport = CommonFields & {
  total_consumption_kwh: number;
  average_consumption_kwh: number;
  peak_consumption_kwh: number;
  night_consumption_kwh: number;
  facility_analysis: Record<
    string,
    { total_kwh: number; avg_kwh: number; anomalies: number }
  >;
  night_idle_issues: {
    high_night_consumption_count: number;
    night_consumption_percentage: number;
    issue_severity: SeverityLabel;
  };
};

export type WaterReport = CommonFields & {
  total_consumption_gallons: number;
  average_consumption_gallons: number;
  peak_consumption_gallons: number;
  night_consumption_gallons: number;
  facility_analysis: Record<
    string,
    { total_gallons: number; avg_gallons: number; anomalies: number }
  >;
  potential_leaks: {
    high_anomaly_count: number;
    facilities_at_risk: string[];
    leak_probability: "HIGH" | "LOW";
    recommended_inspection: string[];
  };
};

export type ResourceKind = "electricity" | "water";

function rollups<T>(
  facilities: ReadonlyMap<string, FacilityRollup>,
  shape: (r: FacilityRollup) => T
): Record<string, T> {
  return Object.fromEntries(
    [...facilities].map(([facility, r]) => [facility, shape(r)])
  );
}

export const electricityProfile: ResourceProfile<
  NightIdleIssues,
  ElectricityReport
> = {
  resource: "electricity",
  valueColumn: "consumption_kwh",
  strategy: new NightIdleStrategy(),
  render: (s) => ({
    total_consumption_kwh: round2(s.total),
    average_consumption_kwh: round2(s.average),
    peak_consumption_kwh: round2(s.peak),
    night_consumption_kwh: round2(s.nightTotal),
    anomalies_detected: s.anomalyCount,
    anomaly_threshold: round2(s.threshold),
    consumption_trend: s.trend,
    facility_analysis: rollups(s.facilities, (r) => ({
      total_kwh: round2(r.total),
      avg_kwh: round2(r.average),
      anomalies: r.anomalyCount,
    })),
    night_idle_issues: {
      high_night_consumption_count: s.issues.highNightUsageCount,
      night_consumption_percentage: round2(s.issues.nightConsumptionPercentage),
      issue_severity: s.issues.severity,
    },
    anomaly_percentage: round2(s.anomalyPercentage),
  }),
};

export const waterProfile: ResourceProfile<LeakRiskIssues, WaterReport> = {
  resource: "water",
  valueColumn: "consumption_gallons",
  strategy: new LeakRiskStrategy(),
  render: (s) => ({
    total_consumption_gallons: round2(s.total),
    average_consumption_gallons: round2(s.average),
    peak_consumption_gallons: round2(s.peak),
    night_consumption_gallons: round2(s.nightTotal),
    anomalies_detected: s.anomalyCount,
    anomaly_threshold: round2(s.threshold),
    consumption_trend: s.trend,
    facility_analysis: rollups(s.facilities, (r) => ({
      total_gallons: round2(r.total),
      avg_gallons: round2(r.average),
      anomalies: r.anomalyCount,
    })),
    potential_leaks: {
      high_anomaly_count: s.issues.anomalyCount,
      facilities_at_risk: [...s.issues.facilitiesAtRisk],
      leak_probability: s.issues.leakProbability,
      recommended_inspection: [...s.issues.facilitiesAtRisk],
    },
    anomaly_percentage: round2(s.anomalyPercentage),
  }),
};

export type ElectricityAnalyzer = ResourceAnalyzer<
  NightIdleIssues,
  ElectricityReport
>;
export type WaterAnalyzer = ResourceAnalyzer<LeakRiskIssues, WaterReport>;

export const createElectricityAnalyzer = (
  options?: AnalyzerOptions
): ElectricityAnalyzer => new ResourceAnalyzer(electricityProfile, options);

export const createWaterAnalyzer = (
  options?: AnalyzerOptions
): WaterAnalyzer => new ResourceAnalyzer(waterProfile, options);
