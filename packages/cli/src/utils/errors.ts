/**
 * Error reporting and exit codes
 */

import { ConfigError, SchemaMismatchError } from "@nullmask/core";
import { DatasetFormatError, DatasetReadError } from "@nullmask/dataset";
import { ConfigFileError } from "@nullmask/shared";
import { error } from "./output.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
/** Invalid options or configuration */
export const EXIT_CONFIG_ERROR = 2;
/** Input cannot be read, has an unknown format, or a malformed schema */
export const EXIT_DATA_ERROR = 3;

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigError || err instanceof ConfigFileError) {
    return EXIT_CONFIG_ERROR;
  }
  if (
    err instanceof SchemaMismatchError ||
    err instanceof DatasetReadError ||
    err instanceof DatasetFormatError
  ) {
    return EXIT_DATA_ERROR;
  }
  return EXIT_FAILURE;
}

/**
 * One line per problem: a ConfigError lists each issue on its own line
 */
export function errorLines(err: unknown): string[] {
  if (err instanceof ConfigError) {
    return err.issues.map((issue) => issue.message);
  }
  if (err instanceof ConfigFileError && err.issues.length > 0) {
    return err.issues.map((issue) => `${err.filePath}: ${issue.path}: ${issue.message}`);
  }
  return [formatError(err)];
}

/**
 * Print an error and return the exit code it maps to
 */
export function handleError(err: unknown): number {
  for (const line of errorLines(err)) {
    error(line);
  }
  return exitCodeFor(err);
}
