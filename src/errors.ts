export type AnalysisErrorCode =
  | "EMPTY_DATASET"
  | "DOMAIN"
  | "SCHEMA"
  | "CONFIGURATION";

export abstract class AnalysisError extends Error {
  abstract readonly code: AnalysisErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No rows to analyze. `analyze()` turns this into `{ error }`. */
export class EmptyDatasetError extends AnalysisError {
  readonly code = "EMPTY_DATASET";

  constructor(message = "No data available") {
    super(message);
  }
}

/** A value the statistics cannot express, e.g. a z-score at zero spread. */
export class DomainError extends AnalysisError {
  readonly code = "DOMAIN";
}

export class SchemaError extends AnalysisError {
  readonly code = "SCHEMA";

  constructor(
    message: string,
    readonly missing: readonly string[] = [],
    readonly row?: number
  ) {
    super(message);
  }

  static missingColumns(columns: readonly string[], row?: number) {
    const where = row === undefined ? "" : ` (row ${row})`;
    return new SchemaError(
      `Missing required column(s): ${columns.join(", ")}${where}`,
      columns,
      row
    );
  }

  static invalidValue(column: string, row: number, reason: string) {
    return new SchemaError(
      `Invalid ${column} at row ${row}: ${reason}`,
      [],
      row
    );
  }
}

export class ConfigurationError extends AnalysisError {
  readonly code = "CONFIGURATION";
}
