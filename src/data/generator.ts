import { DateTime } from "luxon";
import { round2 } from "../analysis/stats";

export const DEFAULT_FACILITIES = [
  "Building A",
  "Building B",
  "Hostel Block C",
  "Lab Block D",
  "Library Block",
  "Sports Complex",
  "Cafeteria",
  "Administration",
] as const;

export type Random = () => number;

export type GenerateOptions = {
  days?: number;
  facilities?: readonly string[];
  /** Last day generated is `end - 1 day`. */
  end?: DateTime;
  random?: Random;
};

type BaseRow = {
  timestamp: string;
  /** Calendar date only, as the analyzers read it. */
  date: string;
  hour: number;
  facility: string;
};

export type ElectricityRow = BaseRow & {
  consumption_kwh: number;
  day_of_week: string;
};
export type WaterRow = BaseRow & { consumption_gallons: number };

const WATER_PEAK_HOURS = new Set([7, 8, 9, 18, 19, 20]);

/** Box–Muller over the injected uniform source. */
export function normal(random: Random, mean: number, sd: number): number {
  const u = 1 - random();
  const v = random();
  return mean + sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

const uniform = (random: Random, lo: number, hi: number) =>
  lo + (hi - lo) * random();

function* hours(opts: GenerateOptions) {
  const days = opts.days ?? 90;
  const start = (opts.end ?? DateTime.now()).startOf("day").minus({ days });
  for (let d = 0; d < days; d++) {
    const day = start.plus({ days: d });
    for (const facility of opts.facilities ?? DEFAULT_FACILITIES) {
      for (let hour = 0; hour < 24; hour++) {
        yield { day, facility, hour, at: day.set({ hour }) };
      }
    }
  }
}

/** Hourly campus electricity: busy days, idle nights, occasional heavy days. */
export function generateElectricityData(
  opts: GenerateOptions = {}
): ElectricityRow[] {
  const random = opts.random ?? Math.random;
  const rows: ElectricityRow[] = [];
  for (const { day, facility, hour, at } of hours(opts)) {
    let kwh =
      hour >= 6 && hour < 22
        ? normal(random, 150, 20)
        : normal(random, 40, 10);
    if (day.weekday <= 5) kwh *= 1.1;
    if (random() < 0.1) kwh *= uniform(random, 1.3, 1.8);

    rows.push({
      timestamp: at.toFormat("yyyy-MM-dd HH:mm:ss"),
      date: day.toFormat("yyyy-MM-dd"),
      hour,
      consumption_kwh: round2(Math.max(0, kwh)),
      facility,
      day_of_week: day.toFormat("cccc"),
    });
  }
  return rows;
}

/** Hourly campus water: morning and evening peaks, rare leak-like surges. */
export function generateWaterData(opts: GenerateOptions = {}): WaterRow[] {
  const random = opts.random ?? Math.random;
  const rows: WaterRow[] = [];
  for (const { day, facility, hour, at } of hours(opts)) {
    let gallons = WATER_PEAK_HOURS.has(hour)
      ? normal(random, 80, 15)
      : normal(random, 20, 5);
    if (random() < 0.05) gallons *= uniform(random, 2.0, 3.5);

    rows.push({
      timestamp: at.toFormat("yyyy-MM-dd HH:mm:ss"),
      date: day.toFormat("yyyy-MM-dd"),
      hour,
      consumption_gallons: round2(Math.max(0, gallons)),
      facility,
    });
  }
  return rows;
}
