/**
 * @nullmask/dataset
 *
 * Dataset sources and writers: CSV, TSV, JSON and JSON Lines.
 */

export { DatasetFormatError, DatasetReadError } from "./errors.js";
export { inferFormat, isDatasetFormat, type DatasetFormat } from "./format.js";
export { parseDelimited, stringifyDelimited, type DelimitedFormat } from "./csv.js";
export {
  parseJson,
  parseJsonLines,
  stringifyJson,
  stringifyJsonLines,
  type JsonFormat,
} from "./json.js";
export {
  parseDataset,
  readDataset,
  stringifyDataset,
  writeDataset,
  type DatasetFileOptions,
} from "./io.js";
