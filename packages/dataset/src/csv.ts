import {
  type CellValue,
  type Dataset,
  NULL_MARKER,
  type Row,
  isNullMarker,
  toCanonicalText,
} from "@nullmask/core";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { DatasetReadError } from "./errors.js";

export type DelimitedFormat = "csv" | "tsv";

const DELIMITERS: Readonly<Record<DelimitedFormat, string>> = {
  csv: ",",
  tsv: "\t",
};

interface ParsedRecord {
  fields: unknown[];
  /** Line on which the record ends */
  line: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function asRecords(value: unknown, format: DelimitedFormat): ParsedRecord[] {
  if (!Array.isArray(value)) {
    throw new DatasetReadError(`${format.toUpperCase()} parsing produced unexpected records`, format);
  }
  return value.map((entry: unknown) => {
    const fields = isObject(entry) ? entry.record : undefined;
    const info = isObject(entry) ? entry.info : undefined;
    const line = isObject(info) ? info.lines : undefined;
    if (!Array.isArray(fields) || typeof line !== "number") {
      throw new DatasetReadError(`${format.toUpperCase()} parsing produced unexpected records`, format);
    }
    return { fields, line };
  });
}

function isBlankLine(fields: readonly unknown[]): boolean {
  return fields.length === 1 && fields[0] === NULL_MARKER;
}

/**
 * Parse delimited text into a dataset.
 *
 * The header row is the schema. Empty cells read as the null marker; every
 * other cell stays text exactly as written. A blank line is skipped, except
 * in a single-column file, where it is a row holding one empty cell.
 *
 * @throws DatasetReadError on malformed input, blank or duplicate headers
 */
export function parseDelimited(text: string, format: DelimitedFormat = "csv"): Dataset {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      delimiter: DELIMITERS[format],
      info: true,
      relax_column_count: true,
      cast: (value: string) => (value === "" ? NULL_MARKER : value),
    });
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new DatasetReadError(
      `${format.toUpperCase()} parsing failed: ${cause ? cause.message : String(error)}`,
      format,
      cause
    );
  }

  const [header, ...records] = asRecords(parsed, format);
  if (!header) {
    return { columns: [], rows: [] };
  }

  const columns = header.fields.map((name, index) => {
    if (typeof name !== "string" || name.trim() === "") {
      throw new DatasetReadError(`Column ${index + 1} has a blank header`, format);
    }
    return name;
  });

  const duplicate = columns.find((name, index) => columns.indexOf(name) !== index);
  if (duplicate !== undefined) {
    throw new DatasetReadError(`Duplicate column "${duplicate}" in header`, format);
  }

  const rows: Row[] = records
    .filter(({ fields }) => columns.length === 1 || !isBlankLine(fields))
    .map(({ fields, line }) => {
      if (fields.length !== columns.length) {
        throw new DatasetReadError(
          `Record on line ${line} has ${fields.length} fields, expected ${columns.length}`,
          format
        );
      }
      return Object.fromEntries(
        columns.map((column, i): [string, CellValue] => {
          const cell = fields[i];
          return [column, typeof cell === "string" ? cell : NULL_MARKER];
        })
      );
    });

  return { columns, rows };
}

/**
 * Render a value for a delimited cell. The null marker is an empty cell.
 */
function toCell(value: CellValue | undefined): string {
  return value === undefined || isNullMarker(value) ? "" : toCanonicalText(value);
}

/**
 * Serialize a dataset as delimited text with a header row in schema order
 */
export function stringifyDelimited(dataset: Dataset, format: DelimitedFormat = "csv"): string {
  const { columns, rows } = dataset;
  const records = [[...columns], ...rows.map((row) => columns.map((column) => toCell(row[column])))];

  return stringify(records, {
    delimiter: DELIMITERS[format],
    record_delimiter: "unix",
    // A lone empty cell would be an empty line, which readers skip
    quoted_empty: columns.length === 1,
  });
}
