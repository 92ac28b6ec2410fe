import type { DatasetFormat } from "./format.js";

/**
 * Error thrown when a file's format cannot be determined or is not supported
 */
export class DatasetFormatError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = "DatasetFormatError";
  }
}

/**
 * Error thrown when dataset content cannot be read or parsed
 */
export class DatasetReadError extends Error {
  constructor(
    message: string,
    public readonly format: DatasetFormat,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "DatasetReadError";
  }
}
