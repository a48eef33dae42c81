import { DateTime } from "luxon";
import { describe, expect, it } from "vitest";
import {
  formatSustainabilityReport,
  generateReport,
} from "../../src/report/sustainability-report";
import { electricityPair, waterPair } from "../helpers/rows";

const at = DateTime.fromISO("2024-03-05T14:07:09", { zone: "utc" });
const RULE = "=".repeat(50);

const electricity = electricityPair(1000, 3000);
const water = waterPair();

describe("formatSustainabilityReport", () => {
  it("renders the fixed-width facility block", () => {
    expect(
      formatSustainabilityReport({
        facility: "Lab Block D",
        resource: "water",
        anomalies: 3,
        threshold: 42.5,
        trend: "stable",
        at,
      })
    ).toBe(
      [
        RULE,
        "SUSTAINABILITY ANALYSIS REPORT",
        RULE,
        "Facility: Lab Block D",
        "Resource Type: WATER",
        "Analysis Date: 2024-03-05 14:07:09",
        "",
        "Anomalies Detected: 3",
        "Alert Threshold: 42.50",
        "Trend: STABLE",
        RULE,
      ].join("\n")
    );
  });
});

describe("generateReport", () => {
  it("summarizes key metrics for executives", () => {
    const text = generateReport("executive", { electricity, water }, at);
    const lines = text.split("\n");
    expect(lines.slice(0, 2)).toEqual([
      "# Executive Summary",
      "Generated: 2024-03-05 14:07:09",
    ]);

    const elec = lines.indexOf("### Electricity");
    expect(lines.slice(elec + 1, elec + 5)).toEqual([
      "- Total Consumption: 4,000 kWh",
      "- Anomalies: 1 (50.0%)",
      "- Trend: INCREASING",
      "- Night Usage: 3000 kWh (75.0% of total)",
    ]);

    const wat = lines.indexOf("### Water");
    expect(lines.slice(wat + 1, wat + 4)).toEqual([
      "- Total Consumption: 40 gallons",
      "- Anomalies: 1 (50.0%)",
      "- Leak Risk: LOW",
    ]);
    expect(lines).toContain("## Responsible AI Note");
  });

  it("omits resources that were not analyzed", () => {
    const text = generateReport("executive", { water }, at);
    expect(text).not.toContain("### Electricity");
    expect(text).toContain("### Water");
  });

  it("dumps each result in the full report", () => {
    expect(generateReport("full", { electricity }, at)).toBe(
      "## Full Report\n\n### ELECTRICITY\n" +
        `${JSON.stringify(electricity, null, 2)}\n`
    );
  });
});
