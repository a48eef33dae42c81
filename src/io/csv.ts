import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { DateTime } from "luxon";
import { z } from "zod";
import type { RawRow } from "../analysis/types";
import { logger } from "../logger";

const log = logger.child({ module: "csv" });

const Rows = z.array(z.record(z.string()));

/** Reads a CSV with a header row into raw rows; cells stay strings. */
export async function loadCsv(file: string): Promise<RawRow[]> {
  const text = await readFile(file, "utf8");
  if (!text.trim()) return [];

  const rows = Rows.parse(
    parse(text, { columns: true, skip_empty_lines: true, trim: true })
  );
  log.info({ file, rows: rows.length }, "csv loaded");
  return rows;
}

export const INSIGHT_RULE = "=".repeat(50);

/** Appends a timestamped insight block to `file`, creating its directory. */
export async function saveInsight(
  text: string,
  file: string,
  now: DateTime = DateTime.now()
) {
  await mkdir(path.dirname(file), { recursive: true });
  const stamp = now.toFormat("yyyy-MM-dd HH:mm:ss");
  await appendFile(file, `\n[${stamp}]\n${text}\n${INSIGHT_RULE}\n`, "utf8");
  log.info({ file }, "insight saved");
}
