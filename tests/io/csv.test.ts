import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { DateTime } from "luxon";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { INSIGHT_RULE, loadCsv, saveInsight } from "../../src/io/csv";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "usage-csv-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadCsv", () => {
  it("reads header-keyed rows with trimmed string cells", async () => {
    const file = path.join(dir, "electricity.csv");
    await writeFile(
      file,
      "date,facility,consumption_kwh\n" +
        "2024-03-01T01:00:00, Building A ,12.5\n\n" +
        "2024-03-01T02:00:00,Cafeteria,8\n"
    );
    expect(await loadCsv(file)).toEqual([
      {
        date: "2024-03-01T01:00:00",
        facility: "Building A",
        consumption_kwh: "12.5",
      },
      {
        date: "2024-03-01T02:00:00",
        facility: "Cafeteria",
        consumption_kwh: "8",
      },
    ]);
  });

  it("returns no rows for a blank file", async () => {
    const file = path.join(dir, "empty.csv");
    await writeFile(file, "\n");
    expect(await loadCsv(file)).toEqual([]);
  });

  it("fails on a missing file", async () => {
    const missing = path.join(dir, "missing.csv");
    await expect(loadCsv(missing)).rejects.toThrow(/ENOENT/);
  });
});

describe("saveInsight", () => {
  it("appends timestamped blocks, creating the directory", async () => {
    const file = path.join(dir, "outputs", "insights_log.txt");
    const at = DateTime.fromISO("2024-03-01T09:30:00", { zone: "utc" });
    await saveInsight("Switch off idle chillers.", file, at);
    await saveInsight("Inspect Hostel Block C.", file, at);

    const block = (text: string) =>
      `\n[2024-03-01 09:30:00]\n${text}\n${INSIGHT_RULE}\n`;
    expect(await readFile(file, "utf8")).toBe(
      block("Switch off idle chillers.") + block("Inspect Hostel Block C.")
    );
  });
});
