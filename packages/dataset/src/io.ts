/**
 * Dataset file reading and writing
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Dataset } from "@nullmask/core";
import { logger } from "@nullmask/shared";
import { parseDelimited, stringifyDelimited } from "./csv.js";
import { DatasetReadError } from "./errors.js";
import { type DatasetFormat, inferFormat } from "./format.js";
import { parseJson, parseJsonLines, stringifyJson, stringifyJsonLines } from "./json.js";

export interface DatasetFileOptions {
  /** Overrides the format inferred from the file extension */
  format?: DatasetFormat | undefined;
}

export function parseDataset(text: string, format: DatasetFormat): Dataset {
  switch (format) {
    case "csv":
    case "tsv":
      return parseDelimited(text, format);
    case "json":
      return parseJson(text);
    case "jsonl":
      return parseJsonLines(text);
  }
}

export function stringifyDataset(dataset: Dataset, format: DatasetFormat): string {
  switch (format) {
    case "csv":
    case "tsv":
      return stringifyDelimited(dataset, format);
    case "json":
      return stringifyJson(dataset);
    case "jsonl":
      return stringifyJsonLines(dataset);
  }
}

/**
 * Read a dataset file
 *
 * @throws DatasetFormatError if no format is given and the extension is unknown
 * @throws DatasetReadError if the file cannot be read or parsed
 */
export async function readDataset(filePath: string, options: DatasetFileOptions = {}): Promise<Dataset> {
  const format = options.format ?? inferFormat(filePath);

  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new DatasetReadError(
      `Failed to read ${filePath}: ${cause ? cause.message : String(error)}`,
      format,
      cause
    );
  }

  const dataset = parseDataset(text, format);
  logger.debug(
    { file: filePath, format, rows: dataset.rows.length, columns: dataset.columns.length },
    "Dataset loaded"
  );
  return dataset;
}

/**
 * Write a dataset file, creating its directory if needed
 *
 * @throws DatasetFormatError if no format is given and the extension is unknown
 */
export async function writeDataset(
  filePath: string,
  dataset: Dataset,
  options: DatasetFileOptions = {}
): Promise<void> {
  const format = options.format ?? inferFormat(filePath);
  const content = stringifyDataset(dataset, format);

  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf-8");

  logger.debug({ file: filePath, format, rows: dataset.rows.length }, "Dataset written");
}
