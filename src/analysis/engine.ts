import { z } from "zod";
import { EmptyDatasetError } from "../errors";
import { logger, type Logger } from "../logger";
import { detectAnomalies } from "./anomaly";
import { aggregateFacilities } from "./facilities";
import { DEFAULT_NIGHT_HOURS, isNightTime } from "./night";
import { normalizeRecords } from "./normalizer";
import { maxOf, sum } from "./stats";
import { trendDirection } from "./trend";
import type {
  AnalysisFailure,
  AnalysisSummary,
  AnalyzerOptions,
  FlaggedRecord,
  IssueStrategy,
  RawRow,
} from "./types";

export const DEFAULT_ANOMALY_PERCENTILE = 75;

/**
 * Symbol key under which a result carries its flagged records; JSON
 * output skips it.
 */
export const flaggedRecords = Symbol("flaggedRecords");

export type WithFlaggedRecords = {
  readonly [flaggedRecords]: readonly FlaggedRecord[];
};

export type AnalysisResult<TReport> = TReport & WithFlaggedRecords;

/**
 * Binds a resource's value column and issue policy to the report shape
 * callers consume.
 */
export type ResourceProfile<TIssues, TReport> = {
  readonly resource: string;
  readonly valueColumn: string;
  readonly dateColumn?: string;
  readonly strategy: IssueStrategy<TIssues>;
  render(summary: AnalysisSummary<TIssues>): TReport;
};

export type FlaggedSet = {
  readonly records: readonly FlaggedRecord[];
  readonly threshold: number;
};

const Percentile = z.number().finite().min(0).max(100);

const Options = z.object({
  nightHours: z.array(z.number().int().min(0).max(23)).optional(),
  anomalyPercentile: Percentile.optional(),
});

export class ResourceAnalyzer<TIssues, TReport extends object> {
  readonly nightHours: ReadonlySet<number>;
  readonly anomalyPercentile: number;
  private readonly log: Logger;

  constructor(
    readonly profile: ResourceProfile<TIssues, TReport>,
    options: AnalyzerOptions = {}
  ) {
    const opts = Options.parse({
      nightHours: options.nightHours ? [...options.nightHours] : undefined,
      anomalyPercentile: options.anomalyPercentile,
    });
    this.nightHours = opts.nightHours
      ? new Set(opts.nightHours)
      : DEFAULT_NIGHT_HOURS;
    this.anomalyPercentile =
      opts.anomalyPercentile ?? DEFAULT_ANOMALY_PERCENTILE;
    this.log = logger.child({
      module: "analyzer",
      resource: profile.resource,
    });
  }

  /**
   * Runs the whole pipeline. An empty table yields `{ error }` instead of
   * throwing; schema and domain errors propagate, and so does the
   * `ZodError` of a percentile outside [0, 100].
   */
  analyze(
    rows: readonly RawRow[],
    percentile = this.anomalyPercentile
  ): AnalysisResult<TReport> | AnalysisFailure {
    try {
      const set = this.flag(rows, percentile);
      const summary = this.summarize(set);
      this.log.debug(
        {
          rows: rows.length,
          threshold: set.threshold,
          anomalies: summary.anomalyCount,
        },
        "analysis complete"
      );

      const report = deepFreeze(this.profile.render(summary));
      const result: AnalysisResult<TReport> = {
        ...report,
        [flaggedRecords]: set.records,
      };
      Object.freeze(result);
      return result;
    } catch (err) {
      if (err instanceof EmptyDatasetError) {
        this.log.warn({ rows: rows.length }, err.message);
        return { error: err.message };
      }
      throw err;
    }
  }

  /**
   * Normalizes the table and attaches anomaly and night flags. All flags
   * are in place before the returned set is handed to any reader.
   */
  flag(
    rows: readonly RawRow[],
    percentile = this.anomalyPercentile
  ): FlaggedSet {
    const p = Percentile.parse(percentile);
    if (!rows.length) throw new EmptyDatasetError();
    const records = normalizeRecords(rows, {
      valueColumn: this.profile.valueColumn,
      dateColumn: this.profile.dateColumn,
    });

    const { threshold, flags } = detectAnomalies(
      records.map((r) => r.value),
      p
    );

    const flagged = records.map((r, i) =>
      Object.freeze({
        ...r,
        ...flags[i],
        isNightTime: isNightTime(r.hour, this.nightHours),
      })
    );
    return { records: Object.freeze(flagged), threshold };
  }

  /** Read-only fan-out over a fully flagged set. */
  summarize({ records, threshold }: FlaggedSet): AnalysisSummary<TIssues> {
    if (!records.length) throw new EmptyDatasetError();
    const values = records.map((r) => r.value);
    const total = sum(values);
    const anomalyCount = records.filter((r) => r.isAnomaly).length;

    return {
      total,
      average: total / values.length,
      peak: maxOf(values),
      nightTotal: sum(records.filter((r) => r.isNightTime).map((r) => r.value)),
      anomalyCount,
      threshold,
      anomalyPercentage: (anomalyCount / records.length) * 100,
      trend: trendDirection(values),
      facilities: aggregateFacilities(records),
      issues: this.profile.strategy.detect(records, threshold),
    };
  }
}

export function isAnalysisFailure<T extends object>(
  result: T | AnalysisFailure
): result is AnalysisFailure {
  return "error" in result && typeof result.error === "string";
}

/** Anomalous records of a result, highest value first. */
export function getAnomalies(result: WithFlaggedRecords): FlaggedRecord[] {
  return result[flaggedRecords]
    .filter((r) => r.isAnomaly)
    .sort((a, b) => b.value - a.value);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}
