/**
 * Null injector
 *
 * Walks every cell of a dataset and decides, per cell:
 *   1. column not eligible      -> keep
 *   2. value already null        -> keep (not counted)
 *   3. pattern does not match    -> keep
 *   4. sampler draw              -> null marker, or keep
 *
 * All validation happens while the plan is built. Once a plan exists the
 * row walk cannot fail, so a dataset is either fully processed or not
 * touched at all.
 */

import { logger } from "@nullmask/shared";
import { ColumnSelector, findUnknownColumns } from "./column-selector.js";
import {
  type InjectionConfig,
  type RawInjectionConfig,
  normalizeColumnNames,
  validateConfig,
} from "./config.js";
import { ConfigError, SchemaMismatchError } from "./errors.js";
import { PatternMatcher } from "./pattern-matcher.js";
import { ProbabilitySampler } from "./sampler.js";
import { createSummary } from "./summary.js";
import {
  type CellValue,
  type Dataset,
  type InjectionResult,
  type InjectionSummary,
  NULL_MARKER,
  type Row,
  isNullMarker,
} from "./types.js";

/**
 * Everything derived once per run. Immutable.
 */
export interface InjectionPlan {
  readonly schema: readonly string[];
  readonly config: InjectionConfig;
  readonly selector: ColumnSelector;
  readonly matcher: PatternMatcher;
  readonly sampler: ProbabilitySampler;
}

export interface RowBatchResult {
  rows: Row[];
  summary: InjectionSummary;
}

/**
 * Check that a dataset has a non-empty schema of distinct names, and that
 * every row carries exactly the schema's columns.
 *
 * @throws SchemaMismatchError
 */
export function assertDatasetShape(dataset: Dataset): void {
  const { columns, rows } = dataset;

  if (columns.length === 0) {
    throw new SchemaMismatchError("Dataset has no columns", "empty");
  }

  const schema = new Set<string>();
  for (const column of columns) {
    if (schema.has(column)) {
      throw new SchemaMismatchError(`Duplicate column "${column}" in dataset schema`, "duplicate-column");
    }
    schema.add(column);
  }

  rows.forEach((row, rowIndex) => {
    const missing = columns.filter((column) => !Object.hasOwn(row, column));
    const extra = Object.keys(row).filter((key) => !schema.has(key));
    if (missing.length > 0 || extra.length > 0) {
      const details = [
        missing.length > 0 ? `missing ${missing.join(", ")}` : "",
        extra.length > 0 ? `unexpected ${extra.join(", ")}` : "",
      ]
        .filter(Boolean)
        .join("; ");
      throw new SchemaMismatchError(
        `Row ${rowIndex} does not match the dataset schema (${details})`,
        "row-shape",
        rowIndex
      );
    }
  });
}

/**
 * Validate config against a dataset and derive the per-run components.
 *
 * Config issues and unknown columns are collected into one ConfigError.
 *
 * @throws ConfigError carrying every config issue
 * @throws SchemaMismatchError if the dataset itself is malformed
 */
export function createInjectionPlan(dataset: Dataset, raw: RawInjectionConfig): InjectionPlan {
  const validation = validateConfig(raw);
  assertDatasetShape(dataset);

  // Unknown columns are reported even when other fields are invalid
  const configured = validation.valid
    ? validation.config.columns
    : Array.isArray(raw.columns)
      ? normalizeColumnNames(raw.columns)
      : undefined;

  const issues = [
    ...(validation.valid ? [] : validation.issues),
    ...(configured ? findUnknownColumns(dataset.columns, configured) : []),
  ];

  if (!validation.valid || issues.length > 0) {
    throw new ConfigError(issues);
  }

  const { config } = validation;
  return Object.freeze({
    schema: Object.freeze([...dataset.columns]),
    config,
    selector: ColumnSelector.resolve(dataset.columns, config.columns),
    matcher: new PatternMatcher(config.pattern),
    sampler: new ProbabilitySampler(config.probability, config.seed),
  });
}

export class NullInjector {
  constructor(private readonly plan: InjectionPlan) {}

  get schema(): readonly string[] {
    return this.plan.schema;
  }

  get eligibleColumns(): readonly string[] {
    return this.plan.selector.columns;
  }

  /**
   * Inject nulls into a contiguous run of rows.
   *
   * @param rows - Rows already checked against the plan's schema
   * @param startIndex - Dataset index of rows[0]; draws are keyed by it
   */
  injectRows(rows: readonly Row[], startIndex = 0): RowBatchResult {
    const summary = createSummary(this.plan.selector.columns);
    const output = rows.map((row, offset) => this.injectRow(row, startIndex + offset, summary));

    summary.rowsProcessed = rows.length;
    summary.cellsExamined = rows.length * this.plan.schema.length;

    return { rows: output, summary };
  }

  private injectRow(row: Row, rowIndex: number, summary: InjectionSummary): Row {
    const { schema, selector, matcher, sampler } = this.plan;
    const cells: Array<[string, CellValue]> = [];

    for (const column of schema) {
      const value = row[column] ?? NULL_MARKER;

      if (!selector.includes(column) || isNullMarker(value) || !matcher.matches(value)) {
        cells.push([column, value]);
        continue;
      }

      summary.candidateCells += 1;

      if (sampler.draw(rowIndex, column)) {
        cells.push([column, NULL_MARKER]);
        summary.cellsReplaced += 1;
        summary.replacedByColumn[column] = (summary.replacedByColumn[column] ?? 0) + 1;
      } else {
        cells.push([column, value]);
      }
    }

    return Object.fromEntries(cells);
  }
}

/**
 * Replace matching cells with the null marker.
 *
 * The input dataset is not modified; the result holds new row objects in
 * the same order, with the same columns.
 *
 * @throws ConfigError carrying every config issue (no output is produced)
 * @throws SchemaMismatchError if the dataset has no columns or a malformed row
 */
export function injectNulls(dataset: Dataset, raw: RawInjectionConfig): InjectionResult {
  const started = performance.now();
  const plan = createInjectionPlan(dataset, raw);
  const { rows, summary } = new NullInjector(plan).injectRows(dataset.rows, 0);

  logger.debug(
    {
      rows: summary.rowsProcessed,
      candidates: summary.candidateCells,
      replaced: summary.cellsReplaced,
      durationMs: Math.round(performance.now() - started),
    },
    "Null injection complete"
  );

  return { dataset: { columns: plan.schema, rows }, summary };
}
