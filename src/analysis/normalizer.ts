import { DateTime } from "luxon";
import { SchemaError } from "../errors";
import type { ConsumptionRecord, RawRow } from "./types";

export type NormalizeOptions = {
  valueColumn: string;
  dateColumn?: string;
  facilityColumn?: string;
  /** Zone for timestamps that carry no offset of their own. */
  zone?: string;
};

/**
 * Validates the raw table and derives one canonical record per row.
 *
 * The hour comes from the date column as parsed: a date-only value such
 * as `2024-03-01` yields hour 0. A richer timestamp column, if the table
 * has one, is not consulted.
 *
 * Facility names are kept exactly as written, so `"Building A "` and
 * `"Building A"` are different facilities; only blank names are rejected.
 */
export function normalizeRecords(
  rows: readonly RawRow[],
  opts: NormalizeOptions
): ConsumptionRecord[] {
  const dateColumn = opts.dateColumn ?? "date";
  const facilityColumn = opts.facilityColumn ?? "facility";
  const zone = opts.zone ?? "utc";
  const required = [dateColumn, facilityColumn, opts.valueColumn];

  return rows.map((row, i) => {
    const missing = required.filter((c) => !(c in row));
    if (missing.length) throw SchemaError.missingColumns(missing, i);

    const timestamp = parseTimestamp(row[dateColumn], zone);
    if (!timestamp) {
      throw SchemaError.invalidValue(dateColumn, i, "not a date");
    }

    const facility = row[facilityColumn];
    if (typeof facility !== "string" || !facility.trim()) {
      throw SchemaError.invalidValue(facilityColumn, i, "facility is empty");
    }

    const value = parseValue(row[opts.valueColumn]);
    if (value === null) {
      throw SchemaError.invalidValue(opts.valueColumn, i, "not a number");
    }
    if (value < 0) {
      throw SchemaError.invalidValue(opts.valueColumn, i, "negative value");
    }

    return Object.freeze({
      timestamp,
      hour: timestamp.hour,
      facility,
      value,
    });
  });
}

export function parseTimestamp(raw: unknown, zone = "utc"): DateTime | null {
  let dt: DateTime | null = null;
  if (raw instanceof Date) {
    dt = DateTime.fromJSDate(raw, { zone });
  } else if (DateTime.isDateTime(raw)) {
    dt = raw;
  } else if (typeof raw === "string" && raw.trim()) {
    const s = raw.trim();
    // `setZone` keeps an explicit offset: the hour is the one in the cell
    dt = DateTime.fromISO(s, { zone, setZone: true });
    if (!dt.isValid) dt = DateTime.fromSQL(s, { zone, setZone: true });
  }
  return dt?.isValid ? dt : null;
}

function parseValue(raw: unknown): number | null {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
  if (typeof raw === "string" && raw.trim()) {
    const n = Number(raw.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}
