import "dotenv/config";
import { z } from "zod";

const percentile = z.coerce.number().min(0).max(100);

const hourList = z
  .string()
  .transform((raw) => raw.split(",").map((h) => h.trim()).filter(Boolean))
  .pipe(z.array(z.coerce.number().int().min(0).max(23)));

const Env = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  PORT: z.coerce.number().int().positive().default(3000),
  DATA_DIR: z.string().default("data"),
  INSIGHTS_FILE: z.string().default("outputs/insights_log.txt"),
  ELECTRICITY_THRESHOLD_PERCENTILE: percentile.default(75),
  WATER_THRESHOLD_PERCENTILE: percentile.default(75),
  NIGHT_TIME_HOURS: hourList.default("22,23,0,1,2,3,4,5"),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default("gemini-2.0-flash-001"),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(500),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  POLICY_DOCS_PATH: z.string().optional(),
});

export type Env = z.infer<typeof Env>;

export const env: Readonly<Env> = Object.freeze(Env.parse(process.env));
