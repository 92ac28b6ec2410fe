/**
 * Terminal output helpers
 *
 * Human-readable text goes to stderr; stdout carries only machine output
 * (`json`), so `nullmask ... --json | jq` works.
 */

import pc from "picocolors";

export const symbols = {
  success: pc.green("✓"),
  error: pc.red("✗"),
  warning: pc.yellow("⚠"),
  info: pc.blue("ℹ"),
} as const;

export function info(message: string): void {
  console.error(`${symbols.info} ${message}`);
}

export function success(message: string): void {
  console.error(`${symbols.success} ${pc.green(message)}`);
}

export function warn(message: string): void {
  console.error(`${symbols.warning} ${pc.yellow(message)}`);
}

export function error(message: string): void {
  console.error(`${symbols.error} ${pc.red(message)}`);
}

export function dim(message: string): void {
  console.error(pc.dim(message));
}

export function header(title: string): void {
  console.error(pc.bold(title));
}

/**
 * Print an aligned "Label: value" line
 */
export function keyValue(key: string, value: string, width = 18): void {
  console.error(`  ${pc.dim(`${key}:`.padEnd(width))} ${value}`);
}

export function newline(): void {
  console.error("");
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
