import { DomainError, EmptyDatasetError } from "../errors";
import { percentile, spread } from "./stats";

export type AnomalyFlags = {
  readonly isAnomaly: boolean;
  readonly anomalySeverity: number;
};

export type AnomalyDetection = {
  /** Pp of the whole set; flagging is strictly above it. */
  threshold: number;
  mean: number;
  std: number;
  /** Flags in input order, one per value. */
  flags: AnomalyFlags[];
};

/**
 * Percentile-threshold anomaly flags plus a z-score for every value.
 * A value equal to the threshold is not anomalous.
 */
export function detectAnomalies(
  values: readonly number[],
  p: number
): AnomalyDetection {
  if (!values.length) throw new EmptyDatasetError();
  const threshold = percentile(values, p);
  const { mean, std } = spread(values);

  const flags = values.map((v) => ({
    isAnomaly: v > threshold,
    anomalySeverity: zScore(v, mean, std),
  }));
  return { threshold, mean, std, flags };
}

export function zScore(value: number, mean: number, std: number): number {
  if (std > 0) return (value - mean) / std;
  if (value === mean) return 0;
  throw new DomainError(
    `Severity of ${value} is indeterminate: ` +
      `series has zero spread around ${mean}`
  );
}
