/**
 * Core data model for null injection
 */

/**
 * The distinguished value written in place of a masked cell.
 * A cell holding it is present; it is not the same as a missing key.
 */
export const NULL_MARKER = null;

export type NullMarker = typeof NULL_MARKER;

/**
 * A number kept as its source text, for numbers a JS `number` would alter
 * (integers past 2^53, `1.50`, `1e3`). Written back exactly as read.
 */
export class NumericLiteral {
  constructor(readonly text: string) {}

  toString(): string {
    return this.text;
  }
}

/** Values with no dedicated rendering rule: bigints, dates, arrays, nested objects */
export type OpaqueValue = bigint | object;

export type CellValue = string | number | boolean | NullMarker | OpaqueValue;

/** A row maps every schema column to a value */
export type Row = Readonly<Record<string, CellValue>>;

export interface Dataset {
  /** Ordered column names (the schema) */
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export function isNullMarker(value: CellValue): value is NullMarker {
  return value === NULL_MARKER;
}

/**
 * Narrow an arbitrary parsed value (JSON, CSV) to a cell value.
 * `undefined` becomes the null marker.
 */
export function toCellValue(value: unknown): CellValue {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "bigint":
      return value;
    case "undefined":
      return NULL_MARKER;
    case "object":
      return value;
    default:
      return String(value);
  }
}

/**
 * Per-run counters. Summaries from independent row ranges combine by summing.
 */
export interface InjectionSummary {
  rowsProcessed: number;
  /** Every cell walked: rows x schema columns */
  cellsExamined: number;
  /** Eligible, non-null, pattern-matching cells that reached a draw */
  candidateCells: number;
  cellsReplaced: number;
  /** Replacements per eligible column (zero included) */
  replacedByColumn: Record<string, number>;
}

export interface InjectionResult {
  dataset: Dataset;
  summary: InjectionSummary;
}
