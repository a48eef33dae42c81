import { describe, expect, it } from "vitest";
import { DEFAULT_NIGHT_HOURS, isNightTime } from "../../src/analysis/night";
import { createElectricityAnalyzer } from "../../src/analysis/resources";
import { kwhRow } from "../helpers/rows";

describe("isNightTime", () => {
  it("covers 22:00 through 05:59 by default", () => {
    expect([...DEFAULT_NIGHT_HOURS].sort((a, b) => a - b)).toEqual([
      0, 1, 2, 3, 4, 5, 22, 23,
    ]);
    expect(isNightTime(22)).toBe(true);
    expect(isNightTime(5)).toBe(true);
    expect(isNightTime(6)).toBe(false);
    expect(isNightTime(21)).toBe(false);
  });

  it("honours a custom window", () => {
    expect(isNightTime(12, new Set([12]))).toBe(true);
    expect(isNightTime(23, new Set([12]))).toBe(false);
  });

  it("depends on the hour only", () => {
    const { records } = createElectricityAnalyzer().flag([
      kwhRow(5, { facility: "Cafeteria", hour: 23 }),
      kwhRow(900, { facility: "Library Block", hour: 23 }),
      kwhRow(5, { facility: "Cafeteria", hour: 14 }),
      kwhRow(900, { facility: "Library Block", hour: 14 }),
    ]);
    expect(records.map((r) => r.isNightTime)).toEqual([
      true,
      true,
      false,
      false,
    ]);
  });
});
