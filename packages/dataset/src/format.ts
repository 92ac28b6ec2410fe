import { extname } from "node:path";
import { DATASET_FORMATS } from "@nullmask/shared";
import { DatasetFormatError } from "./errors.js";

export type DatasetFormat = (typeof DATASET_FORMATS)[number];

const EXTENSIONS: Readonly<Record<string, DatasetFormat>> = {
  ".csv": "csv",
  ".tsv": "tsv",
  ".tab": "tsv",
  ".json": "json",
  ".jsonl": "jsonl",
  ".ndjson": "jsonl",
};

const FORMAT_NAMES: ReadonlySet<string> = new Set(DATASET_FORMATS);

export function isDatasetFormat(value: string): value is DatasetFormat {
  return FORMAT_NAMES.has(value);
}

/**
 * Infer a dataset format from a file extension
 *
 * @throws DatasetFormatError for unrecognized extensions
 */
export function inferFormat(filePath: string): DatasetFormat {
  const extension = extname(filePath).toLowerCase();
  const format = EXTENSIONS[extension];
  if (!format) {
    throw new DatasetFormatError(
      `Cannot infer dataset format from "${filePath}" (expected one of ${Object.keys(EXTENSIONS).join(", ")}); pass a format explicitly`,
      filePath
    );
  }
  return format;
}
