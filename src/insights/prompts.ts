import type { FlaggedRecord } from "../analysis/types";
import type { ElectricityReport, WaterReport } from "../analysis/resources";

export const SYSTEM_PROMPT = [
  "You are a sustainability decision-support assistant for campus facilities.",
  "Your role is to:",
  "1. Analyze resource consumption data and identify inefficiencies",
  "2. Give evidence-based explanations for consumption patterns",
  "3. Suggest low-cost, practical interventions",
  "4. Be transparent about your reasoning",
  "",
  "You provide recommendations, not enforcement. Decisions remain with administrators.",
].join("\n");

/** Anomalies listed in a prompt, highest first. */
export const MAX_ANOMALY_LINES = 10;

function facilityLines<T>(
  facilities: Record<string, T>,
  describe: (name: string, rollup: T) => string
) {
  const entries = Object.entries(facilities);
  if (!entries.length) return "none";
  return entries.map(([name, rollup]) => describe(name, rollup)).join("\n");
}

export function anomalyLines(
  anomalies: readonly FlaggedRecord[],
  unit: string
) {
  if (!anomalies.length) return "none";
  return anomalies
    .slice(0, MAX_ANOMALY_LINES)
    .map((a) => {
      const at = a.timestamp.toFormat("yyyy-MM-dd HH:mm");
      const z = a.anomalySeverity.toFixed(2);
      return `- ${a.facility} @ ${at}: ${a.value} ${unit} (z=${z})`;
    })
    .join("\n");
}

export function electricityPrompt(
  r: ElectricityReport,
  anomalies: readonly FlaggedRecord[] = []
) {
  const night = r.night_idle_issues;
  return [
    "Analyze the following electricity consumption data and provide insights.",
    "",
    "FACILITY DATA:",
    facilityLines(
      r.facility_analysis,
      (name, f) =>
        `- ${name}: total=${f.total_kwh} kWh, avg=${f.avg_kwh} kWh, ` +
        `anomalies=${f.anomalies}`
    ),
    "",
    "CONSUMPTION STATISTICS:",
    `- Total Consumption: ${r.total_consumption_kwh} kWh`,
    `- Average Consumption: ${r.average_consumption_kwh} kWh`,
    `- Peak Consumption: ${r.peak_consumption_kwh} kWh`,
    `- Night-time Consumption: ${r.night_consumption_kwh} kWh ` +
      `(${night.night_consumption_percentage}% of total)`,
    `- Anomalies Detected: ${r.anomalies_detected} instances ` +
      `above ${r.anomaly_threshold} kWh`,
    `- Night Idle Severity: ${night.issue_severity} ` +
      `(${night.high_night_consumption_count} high night readings)`,
    `- Trend: ${r.consumption_trend}`,
    "",
    "ANOMALY DETAILS:",
    anomalyLines(anomalies, "kWh"),
    "",
    "Based on this data, provide:",
    "1. Key findings about consumption patterns",
    "2. Explanation of night-time usage and idle consumption",
    "3. Facility-specific insights",
    "4. Potential causes of anomalies",
    "5. Sustainability recommendations (low-cost, practical)",
  ].join("\n");
}

export function waterPrompt(
  r: WaterReport,
  anomalies: readonly FlaggedRecord[] = []
) {
  const leaks = r.potential_leaks;
  return [
    "Analyze the following water consumption data and identify potential waste.",
    "",
    "FACILITY DATA:",
    facilityLines(
      r.facility_analysis,
      (name, f) =>
        `- ${name}: total=${f.total_gallons} gallons, ` +
        `avg=${f.avg_gallons} gallons, anomalies=${f.anomalies}`
    ),
    "",
    "CONSUMPTION STATISTICS:",
    `- Total Consumption: ${r.total_consumption_gallons} gallons`,
    `- Average Consumption: ${r.average_consumption_gallons} gallons per hour`,
    `- Peak Consumption: ${r.peak_consumption_gallons} gallons`,
    `- Night-time Consumption: ${r.night_consumption_gallons} gallons`,
    `- Anomalies Detected: ${r.anomalies_detected} instances ` +
      `above ${r.anomaly_threshold} gallons`,
    `- Trend: ${r.consumption_trend}`,
    "",
    "LEAK INDICATORS:",
    `- Leak probability: ${leaks.leak_probability}`,
    `- Facilities at risk: ${leaks.facilities_at_risk.join(", ") || "none"}`,
    "",
    "ANOMALY DETAILS:",
    anomalyLines(anomalies, "gallons"),
    "",
    "Based on this analysis, provide:",
    "1. Assessment of consumption patterns",
    "2. Identification of potential leaks or continuous usage",
    "3. Explanation of anomalies",
    "4. Water conservation recommendations",
    "5. Priority areas for immediate inspection",
  ].join("\n");
}

export function combinedPrompt(elec: ElectricityReport, water: WaterReport) {
  return [
    "Generate a sustainability report combining electricity and water analysis.",
    "",
    "ELECTRICITY:",
    `- Total: ${elec.total_consumption_kwh} kWh`,
    `- Anomalies: ${elec.anomalies_detected} events`,
    `- Night usage: ${elec.night_consumption_kwh} kWh`,
    "",
    "WATER:",
    `- Total: ${water.total_consumption_gallons} gallons`,
    `- Anomalies: ${water.anomalies_detected} events`,
    `- Leak Risk: ${water.potential_leaks.leak_probability}`,
    "",
    "Provide:",
    "1. Overall sustainability assessment",
    "2. Cross-resource inefficiency patterns",
    "3. Integrated recommendations",
    "4. 30-day action plan",
    "5. Expected cost savings",
  ].join("\n");
}

export function anomalyExplanationPrompt(description: string, context: string) {
  return [
    "Given the following anomaly:",
    "",
    description,
    "",
    "Context:",
    context,
    "",
    "Please explain:",
    "1. What likely caused this anomaly?",
    "2. What is the confidence level (high/medium/low)?",
    "3. What interventions would address this?",
    "4. Are there any data limitations in this analysis?",
  ].join("\n");
}

export function policyGroundedPrompt(summary: string, policies: string) {
  return [
    "Based on this analysis:",
    summary,
    "",
    "And considering these sustainability best practices:",
    policies,
    "",
    "Provide concrete, implementable recommendations that:",
    "1. Address identified inefficiencies",
    "2. Align with best practices",
    "3. Have clear ROI and timelines",
    "4. Respect privacy and autonomy",
    "5. Support rather than mandate behavior change",
  ].join("\n");
}
