import { randomUUID } from "node:crypto";
import express, {
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import { ZodError, z } from "zod";
import { calculateDailyStats } from "../analysis/daily";
import { getAnomalies, isAnalysisFailure } from "../analysis/engine";
import { normalizeRecords } from "../analysis/normalizer";
import {
  createElectricityAnalyzer,
  createWaterAnalyzer,
  type ElectricityAnalyzer,
  type WaterAnalyzer,
} from "../analysis/resources";
import type { FlaggedRecord } from "../analysis/types";
import { env } from "../env";
import { AnalysisError } from "../errors";
import {
  recommendCombined,
  recommendFromElectricity,
  recommendFromWater,
} from "../insights/recommender";
import { logger } from "../logger";
import { PolicyRetriever, POLICY_TOPICS } from "../policies/retriever";
import {
  generateReport,
  type ReportResults,
} from "../report/sustainability-report";

const log = logger.child({ module: "http" });

export type Analyzers = {
  electricity: ElectricityAnalyzer;
  water: WaterAnalyzer;
};

export const defaultAnalyzers = (): Analyzers => ({
  electricity: createElectricityAnalyzer({
    anomalyPercentile: env.ELECTRICITY_THRESHOLD_PERCENTILE,
    nightHours: env.NIGHT_TIME_HOURS,
  }),
  water: createWaterAnalyzer({
    anomalyPercentile: env.WATER_THRESHOLD_PERCENTILE,
    nightHours: env.NIGHT_TIME_HOURS,
  }),
});

const Resource = z.enum(["electricity", "water"]);
const Rows = z.array(z.record(z.unknown()));
const AnalyzeBody = z.object({
  records: Rows,
  percentile: z.number().min(0).max(100).optional(),
});
const CombinedBody = z.object({
  electricity: Rows.optional(),
  water: Rows.optional(),
});
const ReportKind = z.enum(["executive", "full"]);

const STATUS: Record<AnalysisError["code"], number> = {
  EMPTY_DATASET: 422,
  SCHEMA: 400,
  DOMAIN: 422,
  CONFIGURATION: 503,
};

const handle =
  (fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    fn(req, res).catch(next);
  };

export function toRecordRow(r: FlaggedRecord) {
  return {
    timestamp: r.timestamp.toISO(),
    hour: r.hour,
    facility: r.facility,
    value: r.value,
    is_anomaly: r.isAnomaly,
    anomaly_severity: r.anomalySeverity,
    is_night_time: r.isNightTime,
  };
}

export function createApp({
  analyzers = defaultAnalyzers(),
  policies = new PolicyRetriever(""),
}: { analyzers?: Analyzers; policies?: PolicyRetriever } = {}) {
  const app = express();
  app.use(express.json({ limit: "10mb" }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  // unknown resource names answer 404 before any route handler runs
  app.param("resource", (req, res, next, value) => {
    if (Resource.safeParse(value).success) return next();
    res.status(404).json({ error: `unknown resource: ${String(value)}` });
  });

  app.post(
    "/analyze/:resource",
    handle(async (req, res) => {
      const resource = Resource.parse(req.params.resource);
      const { records, percentile } = AnalyzeBody.parse(req.body);
      const result = analyzers[resource].analyze(records, percentile);
      if (isAnalysisFailure(result)) return res.status(422).json(result);
      res.json(result);
    })
  );

  app.post(
    "/analyze/:resource/anomalies",
    handle(async (req, res) => {
      const resource = Resource.parse(req.params.resource);
      const { records, percentile } = AnalyzeBody.parse(req.body);
      const result = analyzers[resource].analyze(records, percentile);
      if (isAnalysisFailure(result)) return res.status(422).json(result);
      res.json({
        threshold: result.anomaly_threshold,
        anomalies: getAnomalies(result).map(toRecordRow),
      });
    })
  );

  app.post(
    "/analyze/:resource/daily",
    handle(async (req, res) => {
      const resource = Resource.parse(req.params.resource);
      const { records } = AnalyzeBody.parse(req.body);
      const { valueColumn, dateColumn } = analyzers[resource].profile;
      const normalized = normalizeRecords(records, { valueColumn, dateColumn });
      res.json(calculateDailyStats(normalized));
    })
  );

  app.post(
    "/insights/combined",
    handle(async (req, res) => {
      const body = CombinedBody.parse(req.body);
      const electricity = analyzers.electricity.analyze(body.electricity ?? []);
      const water = analyzers.water.analyze(body.water ?? []);
      if (isAnalysisFailure(electricity)) {
        return res.status(422).json(electricity);
      }
      if (isAnalysisFailure(water)) return res.status(422).json(water);
      const text = await recommendCombined({ electricity, water });
      res.json({ text });
    })
  );

  app.post(
    "/insights/:resource",
    handle(async (req, res) => {
      const resource = Resource.parse(req.params.resource);
      const { records, percentile } = AnalyzeBody.parse(req.body);

      if (resource === "electricity") {
        const result = analyzers.electricity.analyze(records, percentile);
        if (isAnalysisFailure(result)) return res.status(422).json(result);
        const text = await recommendFromElectricity({ result, policies });
        return res.json({ text, result });
      }

      const result = analyzers.water.analyze(records, percentile);
      if (isAnalysisFailure(result)) return res.status(422).json(result);
      const text = await recommendFromWater({ result, policies });
      res.json({ text, result });
    })
  );

  app.get("/policies", (req, res) => {
    const topic =
      typeof req.query.topic === "string" && req.query.topic.trim()
        ? req.query.topic
        : POLICY_TOPICS.combined;
    res.json({ topic, context: policies.getPolicyContext(topic) });
  });

  app.post(
    "/reports/:kind",
    handle(async (req, res) => {
      const kind = ReportKind.safeParse(req.params.kind);
      if (!kind.success) {
        return res.status(404).json({ error: "unknown report kind" });
      }

      const body = CombinedBody.parse(req.body);
      const results: ReportResults = {};
      if (body.electricity) {
        const r = analyzers.electricity.analyze(body.electricity);
        if (isAnalysisFailure(r)) return res.status(422).json(r);
        results.electricity = r;
      }
      if (body.water) {
        const r = analyzers.water.analyze(body.water);
        if (isAnalysisFailure(r)) return res.status(422).json(r);
        results.water = r;
      }
      res.type("text/markdown").send(generateReport(kind.data, results));
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "not found" });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = randomUUID();
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      return res.status(400).json({ error: "malformed JSON body", requestId });
    }
    if (err instanceof ZodError) {
      return res
        .status(400)
        .json({ error: "invalid request", issues: err.issues, requestId });
    }
    if (err instanceof AnalysisError) {
      const status = STATUS[err.code];
      log.warn({ err, requestId, path: req.path }, "analysis rejected");
      return res
        .status(status)
        .json({ error: err.message, code: err.code, requestId });
    }
    log.error({ err, requestId, path: req.path }, "request_error");
    res.status(500).json({ error: "internal error", requestId });
  });

  return app;
}
