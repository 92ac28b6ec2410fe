import {
  type CellValue,
  type Dataset,
  NULL_MARKER,
  NumericLiteral,
  type Row,
  toCellValue,
} from "@nullmask/core";
import { parse, stringify } from "lossless-json";
import { DatasetReadError } from "./errors.js";

export type JsonFormat = "json" | "jsonl";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build a total dataset from parsed objects.
 * The schema is every key in first-seen order; absent keys read as the null marker.
 */
function toDataset(records: readonly unknown[], format: JsonFormat): Dataset {
  const columns: string[] = [];
  const seen = new Set<string>();

  records.forEach((record, index) => {
    if (!isRecord(record)) {
      throw new DatasetReadError(`Record ${index + 1} is not an object`, format);
    }
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  });

  const rows: Row[] = records.filter(isRecord).map((record) =>
    Object.fromEntries(
      columns.map((column): [string, CellValue] => [
        column,
        Object.hasOwn(record, column) ? toCellValue(record[column]) : NULL_MARKER,
      ])
    )
  );

  return { columns, rows };
}

/**
 * Numbers that survive a trip through `number` stay numbers; any other
 * number text is kept verbatim so it is written back unchanged.
 */
function parseNumber(text: string): number | NumericLiteral {
  const value = Number(text);
  return String(value) === text ? value : new NumericLiteral(text);
}

function parseJsonText(text: string, format: JsonFormat, location: string): unknown {
  try {
    return parse(text, null, parseNumber);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new DatasetReadError(
      `JSON parsing failed${location}: ${cause ? cause.message : String(error)}`,
      format,
      cause
    );
  }
}

/**
 * Parse a JSON array of objects (or a single object) into a dataset
 */
export function parseJson(text: string): Dataset {
  const parsed = parseJsonText(text, "json", "");

  // Handle both array of objects and single object
  if (Array.isArray(parsed)) {
    return toDataset(parsed, "json");
  }
  if (isRecord(parsed)) {
    return toDataset([parsed], "json");
  }
  throw new DatasetReadError("JSON must be an object or array of objects", "json");
}

/**
 * Parse JSON Lines: one object per non-blank line
 */
export function parseJsonLines(text: string): Dataset {
  const records: unknown[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim()) {
      records.push(parseJsonText(line, "jsonl", ` on line ${index + 1}`));
    }
  });
  return toDataset(records, "jsonl");
}

function orderedRecord(dataset: Dataset, row: Row): Record<string, CellValue> {
  return Object.fromEntries(
    dataset.columns.map((column): [string, CellValue] => [column, row[column] ?? NULL_MARKER])
  );
}

const numericLiterals = [
  {
    test: (value: unknown) => value instanceof NumericLiteral,
    stringify: (value: unknown) => String(value),
  },
];

// bigints and numeric literals are written as bare digits
function toJsonText(value: unknown, space?: number): string {
  return stringify(value, undefined, space, numericLiterals) ?? "null";
}

export function stringifyJson(dataset: Dataset): string {
  const records = dataset.rows.map((row) => orderedRecord(dataset, row));
  return `${toJsonText(records, 2)}\n`;
}

export function stringifyJsonLines(dataset: Dataset): string {
  return dataset.rows.map((row) => `${toJsonText(orderedRecord(dataset, row))}\n`).join("");
}
