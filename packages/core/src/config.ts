/**
 * Injection config validation
 *
 * Every field is checked and every violation is reported, so a caller can
 * show the whole list at once instead of one problem per attempt.
 */

import { z } from "zod/v4";
import { ConfigError, type ConfigErrorCode, type ConfigIssue } from "./errors.js";

/**
 * Config as supplied by a caller (command line, config file, API)
 */
export interface RawInjectionConfig {
  /** Chance (0.0 to 1.0) that a candidate cell is replaced */
  probability: number;
  /** Regular expression searched in each value's text; absent matches everything */
  pattern?: string | undefined;
  ignoreCase?: boolean | undefined;
  /** Column allow-list; absent selects every column */
  columns?: readonly string[] | undefined;
  seed?: number | undefined;
}

/**
 * Validated, immutable config
 */
export interface InjectionConfig {
  readonly probability: number;
  readonly pattern: RegExp | undefined;
  readonly columns: readonly string[] | undefined;
  readonly seed: number;
}

export type ConfigValidationResult =
  | { valid: true; config: InjectionConfig }
  | { valid: false; issues: ConfigIssue[] };

export const DEFAULT_SEED = 0;

const PROBABILITY_RANGE_MESSAGE = "Probability must be between 0.0 and 1.0";
const EMPTY_COLUMN_LIST_MESSAGE = "Column list is empty; omit it to select every column";

// ==================== Zod Schemas ====================

const ProbabilitySchema = z
  .number({ error: "Probability must be a number" })
  .min(0, PROBABILITY_RANGE_MESSAGE)
  .max(1, PROBABILITY_RANGE_MESSAGE);

const PatternSchema = z.string({ error: "Pattern must be a string" }).optional();

const IgnoreCaseSchema = z.boolean({ error: "ignoreCase must be a boolean" }).optional();

const ColumnsSchema = z
  .array(z.string().trim().min(1, "Column names must not be blank"))
  .min(1, EMPTY_COLUMN_LIST_MESSAGE)
  .optional();

const SeedSchema = z
  .number({ error: "Seed must be a number" })
  .int("Seed must be a safe integer")
  .optional();

// ==================== Validation Functions ====================

function toIssues(
  error: z.ZodError,
  field: string,
  codeFor: (path: readonly PropertyKey[]) => ConfigErrorCode,
  describe: (message: string) => string = (message) => message
): ConfigIssue[] {
  return error.issues.map((issue) => ({
    code: codeFor(issue.path),
    path: [field, ...issue.path.map(String)].join("."),
    message: describe(issue.message),
  }));
}

/**
 * Trim column names, drop blanks, and de-duplicate keeping the first occurrence
 */
export function normalizeColumnNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const name of names) {
    const trimmed = name.trim();
    if (trimmed) {
      seen.add(trimmed);
    }
  }
  return [...seen];
}

function isBlankList(value: unknown): boolean {
  return Array.isArray(value) && value.every((name) => typeof name === "string" && name.trim() === "");
}

/**
 * Compile a value pattern. Global and sticky flags are never set, so
 * `test` keeps no state between calls.
 *
 * @throws SyntaxError if the pattern is not a valid regular expression
 */
export function compilePattern(pattern: string, ignoreCase = false): RegExp {
  return new RegExp(pattern, ignoreCase ? "i" : "");
}

/**
 * Validate raw config
 *
 * @returns The validated config, or every issue found
 */
export function validateConfig(raw: RawInjectionConfig): ConfigValidationResult {
  const issues: ConfigIssue[] = [];

  const probability = ProbabilitySchema.safeParse(raw.probability);
  if (!probability.success) {
    issues.push(
      ...toIssues(
        probability.error,
        "probability",
        () => "InvalidProbability",
        (message) => `${message} (got ${String(raw.probability)})`
      )
    );
  }

  const ignoreCase = IgnoreCaseSchema.safeParse(raw.ignoreCase);
  if (!ignoreCase.success) {
    issues.push(...toIssues(ignoreCase.error, "ignoreCase", () => "InvalidPattern"));
  }

  let pattern: RegExp | undefined;
  const patternSource = PatternSchema.safeParse(raw.pattern);
  if (!patternSource.success) {
    issues.push(...toIssues(patternSource.error, "pattern", () => "InvalidPattern"));
  } else if (patternSource.data !== undefined) {
    try {
      pattern = compilePattern(patternSource.data, ignoreCase.success && ignoreCase.data === true);
    } catch (error) {
      issues.push({
        code: "InvalidPattern",
        path: "pattern",
        message: `Pattern ${JSON.stringify(patternSource.data)} is not a valid regular expression: ${
          error instanceof Error ? error.message : String(error)
        }`,
      });
    }
  }

  let columns: string[] | undefined;
  const columnList = ColumnsSchema.safeParse(raw.columns);
  if (!columnList.success && isBlankList(raw.columns)) {
    // `--columns ""` splits to [""]: nothing is left once blanks are dropped
    issues.push({ code: "EmptyColumnList", path: "columns", message: EMPTY_COLUMN_LIST_MESSAGE });
  } else if (!columnList.success) {
    issues.push(
      ...toIssues(columnList.error, "columns", (path) =>
        path.length > 0 ? "InvalidColumnName" : "EmptyColumnList"
      )
    );
  } else if (columnList.data !== undefined) {
    columns = normalizeColumnNames(columnList.data);
  }

  const seed = SeedSchema.safeParse(raw.seed);
  if (!seed.success) {
    issues.push(
      ...toIssues(
        seed.error,
        "seed",
        () => "InvalidSeed",
        (message) => `${message} (got ${String(raw.seed)})`
      )
    );
  }

  if (issues.length > 0 || !probability.success || !seed.success) {
    return { valid: false, issues };
  }

  return {
    valid: true,
    config: Object.freeze({
      probability: probability.data,
      pattern,
      columns: columns ? Object.freeze(columns) : undefined,
      seed: seed.data ?? DEFAULT_SEED,
    }),
  };
}

/**
 * Validate raw config and return it, or throw
 *
 * @throws ConfigError carrying every issue found
 */
export function parseConfig(raw: RawInjectionConfig): InjectionConfig {
  const result = validateConfig(raw);
  if (!result.valid) {
    throw new ConfigError(result.issues);
  }
  return result.config;
}
