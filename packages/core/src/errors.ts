/**
 * Error types raised before any row is processed.
 * Once validation passes, injection cannot fail.
 */

export type ConfigErrorCode =
  | "InvalidProbability"
  | "InvalidPattern"
  | "EmptyColumnList"
  | "InvalidColumnName"
  | "InvalidSeed"
  | "UnknownColumn";

export interface ConfigIssue {
  code: ConfigErrorCode;
  /** Config field the issue belongs to, e.g. "probability" or "columns.1" */
  path: string;
  message: string;
  /** Offending column name for column issues */
  column?: string;
}

/**
 * Error carrying every configuration violation found
 */
export class ConfigError extends Error {
  constructor(public readonly issues: readonly ConfigIssue[]) {
    super(
      issues.length === 1 && issues[0]
        ? `Invalid configuration: ${issues[0].message}`
        : `Invalid configuration (${issues.length} problems): ${issues.map((i) => i.message).join("; ")}`
    );
    this.name = "ConfigError";
  }

  /** Issues with the given code */
  byCode(code: ConfigErrorCode): ConfigIssue[] {
    return this.issues.filter((issue) => issue.code === code);
  }
}

export type SchemaMismatchReason = "empty" | "duplicate-column" | "row-shape";

/**
 * Error thrown when a dataset has no usable schema, or a row does not follow it
 */
export class SchemaMismatchError extends Error {
  constructor(
    message: string,
    public readonly reason: SchemaMismatchReason,
    public readonly rowIndex?: number
  ) {
    super(message);
    this.name = "SchemaMismatchError";
  }
}
