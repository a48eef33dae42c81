import { DateTime } from "luxon";
import type {
  ElectricityReport,
  ResourceKind,
  WaterReport,
} from "../analysis/resources";
import type { Trend } from "../analysis/types";

const RULE = "=".repeat(50);
const STAMP = "yyyy-MM-dd HH:mm:ss";

const whole = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

export function formatSustainabilityReport({
  facility,
  resource,
  anomalies,
  threshold,
  trend,
  at = DateTime.now(),
}: {
  facility: string;
  resource: ResourceKind;
  anomalies: number;
  threshold: number;
  trend: Trend;
  at?: DateTime;
}) {
  return [
    RULE,
    "SUSTAINABILITY ANALYSIS REPORT",
    RULE,
    `Facility: ${facility}`,
    `Resource Type: ${resource.toUpperCase()}`,
    `Analysis Date: ${at.toFormat(STAMP)}`,
    "",
    `Anomalies Detected: ${anomalies}`,
    `Alert Threshold: ${threshold.toFixed(2)}`,
    `Trend: ${trend.toUpperCase()}`,
    RULE,
  ].join("\n");
}

export type ReportResults = {
  electricity?: ElectricityReport;
  water?: WaterReport;
};

export type ReportKind = "executive" | "full";

export function generateReport(
  kind: ReportKind,
  results: ReportResults,
  at: DateTime = DateTime.now()
): string {
  if (kind === "full") {
    const sections = Object.entries(results).map(
      ([resource, data]) =>
        `### ${resource.toUpperCase()}\n${JSON.stringify(data, null, 2)}\n`
    );
    return ["## Full Report", "", ...sections].join("\n");
  }

  const lines = [
    "# Executive Summary",
    `Generated: ${at.toFormat(STAMP)}`,
    "",
    "## Overview",
    "Resource consumption patterns and sustainability inefficiencies detected on campus.",
    "",
    "## Key Metrics",
  ];

  const e = results.electricity;
  if (e) {
    const total = whole.format(e.total_consumption_kwh);
    const share = e.anomaly_percentage.toFixed(1);
    const night = e.night_consumption_kwh.toFixed(0);
    const nightShare =
      e.night_idle_issues.night_consumption_percentage.toFixed(1);
    lines.push(
      "",
      "### Electricity",
      `- Total Consumption: ${total} kWh`,
      `- Anomalies: ${e.anomalies_detected} (${share}%)`,
      `- Trend: ${e.consumption_trend.toUpperCase()}`,
      `- Night Usage: ${night} kWh (${nightShare}% of total)`
    );
  }

  const w = results.water;
  if (w) {
    const total = whole.format(w.total_consumption_gallons);
    const share = w.anomaly_percentage.toFixed(1);
    lines.push(
      "",
      "### Water",
      `- Total Consumption: ${total} gallons`,
      `- Anomalies: ${w.anomalies_detected} (${share}%)`,
      `- Leak Risk: ${w.potential_leaks.leak_probability}`
    );
  }

  lines.push(
    "",
    "## Recommendations",
    "1. Conduct facility audit for night-time usage",
    "2. Implement automated controls for non-critical systems",
    "3. Schedule leak inspections",
    "4. Establish monitoring dashboard",
    "5. Train staff on conservation practices",
    "",
    "## Responsible AI Note",
    "This analysis uses aggregated, facility-level data only. No personal data is processed.",
    "Recommendations support human decision-making; final decisions rest with administration."
  );
  return lines.join("\n");
}
