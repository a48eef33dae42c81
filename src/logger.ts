import pino from "pino";
import { env } from "./env";

export type { Logger } from "pino";

export const logger = pino({
  name: "facility-usage-analyzer",
  level: env.LOG_LEVEL,
  redact: {
    paths: ["apiKey", "*.apiKey", "headers.authorization"],
    remove: true,
  },
});
