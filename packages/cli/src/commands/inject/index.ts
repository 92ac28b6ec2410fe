/**
 * nullmask inject command
 *
 * Read a dataset, replace a sampled share of matching cells with nulls, and
 * write the result. This is the default command: `nullmask in.csv out.csv`
 * and `nullmask inject in.csv out.csv` are the same.
 *
 * Settings precedence:
 * 1. Command-line options
 * 2. Configuration file (--config, or .nullmask.yaml in the working directory)
 * 3. Defaults
 */

import { randomInt } from "node:crypto";
import { resolve } from "node:path";
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CONCURRENCY,
  type InjectionResult,
  type InjectionSummary,
  type RawInjectionConfig,
  injectNullsConcurrently,
  replacementRate,
} from "@nullmask/core";
import { type DatasetFormat, inferFormat, readDataset, writeDataset } from "@nullmask/dataset";
import { DATASET_FORMATS, type FileConfig, loadConfig, logger, setLogLevel } from "@nullmask/shared";
import { type Command, InvalidArgumentError, Option } from "commander";
import type { CommandContext, GlobalOptions } from "../../types.js";
import { dim, header, info, json, keyValue, newline, success, withSpinner } from "../../utils/index.js";

export const DEFAULT_PROBABILITY = 0.1;

// Random seeds stay small enough to retype
const RANDOM_SEED_LIMIT = 2 ** 31;

export interface InjectOptions extends GlobalOptions {
  probability?: number | undefined;
  pattern?: string | undefined;
  ignoreCase?: boolean | undefined;
  columns?: string[] | undefined;
  seed?: number | undefined;
  format?: DatasetFormat | undefined;
  outputFormat?: DatasetFormat | undefined;
  concurrency?: number | undefined;
  chunkSize?: number | undefined;
  config?: string | undefined;
  dryRun?: boolean | undefined;
}

export type SeedSource = "option" | "config" | "random";

export interface InjectSettings {
  injection: RawInjectionConfig & { seed: number };
  seedSource: SeedSource;
  concurrency: number;
  chunkSize: number;
  inputFormat: DatasetFormat | undefined;
  outputFormat: DatasetFormat | undefined;
}

export interface InjectReport {
  input: string;
  output: string;
  dryRun: boolean;
  seed: number;
  seedSource: SeedSource;
  configFile: string | null;
  summary: InjectionSummary;
}

// Left as NaN when not numeric so validation can report it
function parseNumber(value: string): number {
  return value.trim() === "" ? Number.NaN : Number(value);
}

function parsePositiveInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseColumnList(value: string): string[] {
  return value.split(",");
}

function randomSeed(): number {
  return randomInt(RANDOM_SEED_LIMIT);
}

/**
 * Merge command-line options over file settings over defaults
 */
export function resolveInjectSettings(
  options: InjectOptions,
  fileConfig: FileConfig,
  drawSeed: () => number = randomSeed
): InjectSettings {
  const seedSource: SeedSource =
    options.seed !== undefined ? "option" : fileConfig.seed !== undefined ? "config" : "random";

  return {
    injection: {
      probability: options.probability ?? fileConfig.probability ?? DEFAULT_PROBABILITY,
      pattern: options.pattern ?? fileConfig.pattern,
      ignoreCase: options.ignoreCase ?? fileConfig.ignoreCase,
      columns: options.columns ?? fileConfig.columns,
      seed: options.seed ?? fileConfig.seed ?? drawSeed(),
    },
    seedSource,
    concurrency: options.concurrency ?? fileConfig.concurrency ?? DEFAULT_CONCURRENCY,
    chunkSize: options.chunkSize ?? fileConfig.chunkSize ?? DEFAULT_CHUNK_SIZE,
    inputFormat: options.format ?? fileConfig.format,
    outputFormat: options.outputFormat ?? fileConfig.outputFormat,
  };
}

/**
 * Run an injection from start to finish
 *
 * @throws ConfigFileError, ConfigError, SchemaMismatchError, DatasetFormatError or DatasetReadError
 */
export async function injectHandler(
  input: string,
  output: string,
  options: InjectOptions,
  ctx: CommandContext
): Promise<InjectReport> {
  if (options.verbose) {
    setLogLevel("debug");
  }

  const { config: fileConfig, filePath: configFile } = loadConfig({
    path: options.config,
    cwd: ctx.cwd,
  });
  if (configFile && options.verbose && !options.json) {
    info(`Using configuration from ${configFile}`);
  }

  const settings = resolveInjectSettings(options, fileConfig);
  const inputPath = resolve(ctx.cwd, input);
  const outputPath = resolve(ctx.cwd, output);

  // Fail on an unusable output path before doing any work
  const outputFormat = settings.outputFormat ?? inferFormat(outputPath);

  const dataset = await readDataset(inputPath, { format: settings.inputFormat });

  const mask = (update?: (message: string) => void): Promise<InjectionResult> =>
    injectNullsConcurrently(dataset, settings.injection, {
      concurrency: settings.concurrency,
      chunkSize: settings.chunkSize,
      onProgress: update
        ? (processed, total) => update(`Masking rows (${processed}/${total})`)
        : undefined,
    });

  const result =
    ctx.isInteractive && !options.json
      ? await withSpinner("Masking rows", mask, "Masking complete")
      : await mask();

  if (!options.dryRun) {
    await writeDataset(outputPath, result.dataset, { format: outputFormat });
  }

  logger.debug(
    { input: inputPath, output: outputPath, dryRun: Boolean(options.dryRun), seed: settings.injection.seed },
    "Inject command finished"
  );

  return {
    input: inputPath,
    output: outputPath,
    dryRun: Boolean(options.dryRun),
    seed: settings.injection.seed,
    seedSource: settings.seedSource,
    configFile,
    summary: result.summary,
  };
}

function displayReport(report: InjectReport, options: InjectOptions): void {
  if (options.json) {
    json(report);
    return;
  }

  const { summary } = report;

  newline();
  if (report.dryRun) {
    header("Dry run: nothing was written");
  } else {
    success(`Wrote ${report.output}`);
  }
  newline();

  keyValue("Rows processed", String(summary.rowsProcessed));
  keyValue("Cells replaced", `${summary.cellsReplaced} of ${summary.candidateCells} candidates`);
  keyValue("Seed", String(report.seed));

  if (options.verbose) {
    keyValue("Replacement rate", `${(replacementRate(summary) * 100).toFixed(2)}%`);
    newline();
    header("Replaced by column");
    for (const [column, count] of Object.entries(summary.replacedByColumn)) {
      keyValue(column, String(count));
    }
  }

  if (report.seedSource === "random") {
    newline();
    dim(`Seed was chosen at random; pass --seed ${report.seed} to reproduce this run.`);
  }
}

/**
 * Configure the inject command
 */
export function configureInjectCommand(program: Command): void {
  program
    .command("inject", { isDefault: true })
    .description("Replace a random share of matching cells with nulls")
    .argument("<input>", "Dataset to read (.csv, .tsv, .json, .jsonl)")
    .argument("<output>", "Where to write the masked dataset")
    .option(
      "-p, --probability <p>",
      `Chance (0.0 to 1.0) that a matching cell is replaced (default: ${DEFAULT_PROBABILITY})`,
      parseNumber
    )
    .option("--pattern <regex>", "Only replace values whose text matches this regular expression")
    .option("-i, --ignore-case", "Match the pattern case-insensitively")
    .option("-c, --columns <names>", "Comma-separated columns to consider (default: all)", parseColumnList)
    .option("-s, --seed <int>", "Seed for reproducible runs (default: random, reported)", parseNumber)
    .addOption(
      new Option("-f, --format <format>", "Input format (default: from extension)").choices(DATASET_FORMATS)
    )
    .addOption(
      new Option("--output-format <format>", "Output format (default: from extension)").choices(
        DATASET_FORMATS
      )
    )
    .option(
      "--concurrency <n>",
      `Worker units processing chunks (default: ${DEFAULT_CONCURRENCY})`,
      parsePositiveInteger
    )
    .option("--chunk-size <n>", `Rows per chunk (default: ${DEFAULT_CHUNK_SIZE})`, parsePositiveInteger)
    .option("--config <path>", "Configuration file (default: .nullmask.yaml if present)")
    .option("--dry-run", "Compute and report without writing the output")
    .option("--json", "Print the run summary as JSON")
    .option("-v, --verbose", "Show per-column counts and debug logs")
    .action(async (input: string, output: string, options: InjectOptions) => {
      const ctx: CommandContext = {
        cwd: process.cwd(),
        options,
        isCI: Boolean(process.env.CI),
        isInteractive: process.stdout.isTTY ?? false,
      };

      const report = await injectHandler(input, output, options, ctx);
      displayReport(report, options);
    });
}
