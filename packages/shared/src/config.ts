/**
 * Configuration file loading
 *
 * Settings for a masking run can live in a YAML file next to the data:
 *
 *   probability: 0.25
 *   pattern: "@example\\.com$"
 *   columns: [email, phone]
 *   seed: 42
 *
 * Resolution order:
 * 1. An explicit path (--config)
 * 2. The first of CONFIG_FILE_NAMES found in the working directory
 */

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod/v4";

export const CONFIG_FILE_NAMES = [".nullmask.yaml", ".nullmask.yml", "nullmask.config.yaml"] as const;

export const DATASET_FORMATS = ["csv", "tsv", "json", "jsonl"] as const;

// ==================== Zod Schemas ====================

const ColumnsSchema = z.union([
  z.array(z.string()),
  // "a,b,c" is accepted the same way the command line takes it
  z
    .string()
    .transform((value) => value.split(",")),
]);

const FileConfigSchema = z
  .object({
    probability: z.number().optional(),
    pattern: z.string().optional(),
    ignoreCase: z.boolean().optional(),
    columns: ColumnsSchema.optional(),
    seed: z.number().int("Seed must be an integer").optional(),
    concurrency: z.number().int().positive("Concurrency must be a positive integer").optional(),
    chunkSize: z.number().int().positive("Chunk size must be a positive integer").optional(),
    format: z.enum(DATASET_FORMATS).optional(),
    outputFormat: z.enum(DATASET_FORMATS).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface ConfigFileIssue {
  path: string;
  message: string;
}

/**
 * Error thrown when a configuration file cannot be read, parsed or validated
 */
export class ConfigFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly issues: readonly ConfigFileIssue[] = []
  ) {
    super(message);
    this.name = "ConfigFileError";
  }
}

export interface LoadedConfig {
  /** The validated settings */
  config: FileConfig;
  /** Where they came from, or null when no file was found */
  filePath: string | null;
}

export interface LoadConfigOptions {
  /** Explicit file; it must exist */
  path?: string | undefined;
  /** Directory searched for CONFIG_FILE_NAMES (defaults to cwd) */
  cwd?: string | undefined;
}

/**
 * Find the configuration file for a directory
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Validate already-parsed configuration content
 */
export function parseConfigContent(content: unknown, filePath: string): FileConfig {
  // An empty YAML document parses to null
  const result = FileConfigSchema.safeParse(content ?? {});

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join(".") || "(root)",
      message: issue.message,
    }));
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join(", ");
    throw new ConfigFileError(`Invalid configuration in ${filePath}: ${summary}`, filePath, issues);
  }

  return result.data;
}

/**
 * Load the configuration file
 *
 * @returns The validated settings; an empty config when no file exists and none was requested
 * @throws ConfigFileError if the file is missing (when explicit), unreadable, not YAML, or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const filePath = options.path
    ? resolve(options.cwd ?? process.cwd(), options.path)
    : findConfigFile(options.cwd);

  if (!filePath) {
    return { config: {}, filePath: null };
  }

  if (!existsSync(filePath)) {
    throw new ConfigFileError(`Configuration file not found: ${filePath}`, filePath);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigFileError(
      `Failed to read configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  return { config: parseConfigContent(parsed, filePath), filePath };
}
