import { describe, expect, it } from "vitest";
import {
  normalizeRecords,
  parseTimestamp,
} from "../../src/analysis/normalizer";
import { SchemaError } from "../../src/errors";

const opts = { valueColumn: "consumption_kwh" };

describe("normalizeRecords", () => {
  it("derives hour, facility and value from each row", () => {
    const [r] = normalizeRecords(
      [
        {
          date: "2024-03-01T23:15:00",
          facility: "Lab Block D",
          consumption_kwh: "12.5",
        },
      ],
      opts
    );
    expect(r.hour).toBe(23);
    expect(r.facility).toBe("Lab Block D");
    expect(r.value).toBe(12.5);
    expect(r.timestamp.toISODate()).toBe("2024-03-01");
  });

  it("keeps facility names exactly as written", () => {
    const records = normalizeRecords(
      [
        { date: "2024-03-01", facility: "Building A ", consumption_kwh: 1 },
        { date: "2024-03-01", facility: "Building A", consumption_kwh: 2 },
      ],
      opts
    );
    expect(records.map((r) => r.facility)).toEqual([
      "Building A ",
      "Building A",
    ]);
  });

  it("takes the hour from the date column, not from other time columns", () => {
    const [r] = normalizeRecords(
      [
        {
          date: "2024-03-01",
          timestamp: "2024-03-01 23:00:00",
          hour: 23,
          facility: "Cafeteria",
          consumption_kwh: 40,
        },
      ],
      opts
    );
    expect(r.hour).toBe(0);
  });

  it("reports missing columns with the row index", () => {
    const run = () =>
      normalizeRecords(
        [
          { date: "2024-03-01", facility: "A", consumption_kwh: 1 },
          { date: "2024-03-01", consumption_kwh: 1 },
        ],
        opts
      );
    expect(run).toThrow("Missing required column(s): facility (row 1)");

    let caught: unknown;
    try {
      run();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SchemaError);
    expect(caught).toMatchObject({ missing: ["facility"], row: 1 });
  });

  it("rejects values it would otherwise have to guess", () => {
    const row = { date: "2024-03-01", facility: "A" };
    const normalize = (extra: Record<string, unknown>) => () =>
      normalizeRecords([{ ...row, ...extra }], opts);

    expect(normalize({ consumption_kwh: -1 })).toThrow(
      "Invalid consumption_kwh at row 0: negative value"
    );
    expect(normalize({ consumption_kwh: "" })).toThrow(SchemaError);
    expect(normalize({ consumption_kwh: "n/a" })).toThrow(SchemaError);
    expect(normalize({ consumption_kwh: null })).toThrow(SchemaError);
    expect(normalize({ facility: " ", consumption_kwh: 1 })).toThrow(
      "Invalid facility at row 0: facility is empty"
    );
    expect(normalize({ date: "yesterday", consumption_kwh: 1 })).toThrow(
      "Invalid date at row 0: not a date"
    );
  });

  it("accepts zero consumption", () => {
    const [r] = normalizeRecords(
      [{ date: "2024-03-01", facility: "A", consumption_kwh: 0 }],
      opts
    );
    expect(r.value).toBe(0);
  });
});

describe("parseTimestamp", () => {
  it("keeps the hour as written", () => {
    expect(parseTimestamp("2024-03-01T23:15:00+05:00")?.hour).toBe(23);
    expect(parseTimestamp("2024-03-01 07:00:00")?.hour).toBe(7);
    expect(parseTimestamp(new Date(Date.UTC(2024, 2, 1, 4)))?.hour).toBe(4);
  });

  it("returns null for anything that is not a date", () => {
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp(12)).toBeNull();
    expect(parseTimestamp("2024-13-45")).toBeNull();
  });
});
