/**
 * Tests for the inject command
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Command } from "commander";
import { type MockInstance, afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { configureInjectCommand, resolveInjectSettings } from "../../src/commands/inject/index.js";
import { main } from "../../src/index.js";
import type { InjectReport } from "../../src/index.js";
import { EXIT_CONFIG_ERROR, EXIT_DATA_ERROR, EXIT_SUCCESS } from "../../src/utils/index.js";

const PEOPLE_CSV = "id,email,secret\n1,a@example.test,s1\n2,,s2\n3,c@example.test,\n";

describe("inject command", () => {
  describe("command configuration", () => {
    const program = new Command();
    configureInjectCommand(program);
    const injectCmd = program.commands.find((cmd) => cmd.name() === "inject");

    test("configures inject command on program", () => {
      expect(injectCmd).toBeDefined();
      expect(injectCmd?.description()).toBe("Replace a random share of matching cells with nulls");
    });

    test("accepts input and output arguments", () => {
      const args = injectCmd?.registeredArguments ?? [];
      expect(args.map((arg) => arg.name())).toEqual(["input", "output"]);
      expect(args.every((arg) => arg.required)).toBe(true);
    });

    test("has the masking and run options", () => {
      const longs = (injectCmd?.options ?? []).map((o) => o.long);
      expect(longs).toEqual([
        "--probability",
        "--pattern",
        "--ignore-case",
        "--columns",
        "--seed",
        "--format",
        "--output-format",
        "--concurrency",
        "--chunk-size",
        "--config",
        "--dry-run",
        "--json",
        "--verbose",
      ]);
    });

    test("short flags", () => {
      const shorts = (injectCmd?.options ?? []).map((o) => o.short).filter(Boolean);
      expect(shorts).toEqual(["-p", "-i", "-c", "-s", "-f", "-v"]);
    });
  });

  describe("resolveInjectSettings", () => {
    test("falls back to defaults and a drawn seed", () => {
      const settings = resolveInjectSettings({}, {}, () => 42);

      expect(settings.injection).toEqual({ probability: 0.1, seed: 42 });
      expect(settings.seedSource).toBe("random");
      expect(settings.concurrency).toBe(4);
      expect(settings.chunkSize).toBe(1000);
      expect(settings.inputFormat).toBeUndefined();
      expect(settings.outputFormat).toBeUndefined();
    });

    test("file settings override defaults", () => {
      const settings = resolveInjectSettings(
        {},
        { probability: 0.5, columns: ["email"], seed: 9, chunkSize: 10, outputFormat: "json" },
        () => 42
      );

      expect(settings.injection).toEqual({ probability: 0.5, columns: ["email"], seed: 9 });
      expect(settings.seedSource).toBe("config");
      expect(settings.chunkSize).toBe(10);
      expect(settings.outputFormat).toBe("json");
    });

    test("options override file settings", () => {
      const settings = resolveInjectSettings(
        { probability: 0.2, columns: ["secret"], seed: 0, pattern: "x", concurrency: 2 },
        { probability: 0.5, columns: ["email"], seed: 9, pattern: "y", concurrency: 8 },
        () => 42
      );

      expect(settings.injection).toEqual({ probability: 0.2, columns: ["secret"], seed: 0, pattern: "x" });
      expect(settings.seedSource).toBe("option");
      expect(settings.concurrency).toBe(2);
    });
  });

  describe("running", () => {
    let dir: string;
    let input: string;
    let output: string;
    let logSpy: MockInstance<typeof console.log>;
    let errorSpy: MockInstance<typeof console.error>;

    const run = (...args: string[]) => main(["node", "nullmask", ...args]);

    const printedReport = (): InjectReport => {
      const printed = logSpy.mock.calls[0]?.[0];
      return JSON.parse(String(printed));
    };

    const errorOutput = (): string[] => errorSpy.mock.calls.map((call) => String(call[0]));

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "nullmask-cli-"));
      input = join(dir, "people.csv");
      output = join(dir, "out", "masked.csv");
      writeFileSync(input, PEOPLE_CSV);
      logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
      errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
      vi.restoreAllMocks();
      rmSync(dir, { recursive: true, force: true });
    });

    test("masks the selected column and reports the run", async () => {
      const code = await run(input, output, "-p", "1", "-c", "secret", "-s", "7", "--json");

      expect(code).toBe(EXIT_SUCCESS);
      expect(readFileSync(output, "utf-8")).toBe(
        "id,email,secret\n1,a@example.test,\n2,,\n3,c@example.test,\n"
      );
      expect(printedReport()).toEqual({
        input,
        output,
        dryRun: false,
        seed: 7,
        seedSource: "option",
        configFile: null,
        summary: {
          rowsProcessed: 3,
          cellsExamined: 9,
          candidateCells: 2,
          cellsReplaced: 2,
          replacedByColumn: { secret: 2 },
        },
      });
    });

    test("accepts the explicit inject subcommand", async () => {
      const code = await run("inject", input, output, "-p", "0", "--json");

      expect(code).toBe(EXIT_SUCCESS);
      expect(readFileSync(output, "utf-8")).toBe(PEOPLE_CSV);
    });

    test("only replaces values matching the pattern", async () => {
      const code = await run(input, output, "-p", "1", "--pattern", "^C@", "-i", "-s", "1", "--json");

      expect(code).toBe(EXIT_SUCCESS);
      expect(readFileSync(output, "utf-8")).toBe(
        "id,email,secret\n1,a@example.test,s1\n2,,s2\n3,,\n"
      );
      expect(printedReport().summary.replacedByColumn).toEqual({ id: 0, email: 1, secret: 0 });
    });

    test("converts formats when the output extension differs", async () => {
      const jsonOutput = join(dir, "masked.json");

      const code = await run(input, jsonOutput, "-p", "0", "--json");

      expect(code).toBe(EXIT_SUCCESS);
      expect(JSON.parse(readFileSync(jsonOutput, "utf-8"))).toEqual([
        { id: "1", email: "a@example.test", secret: "s1" },
        { id: "2", email: null, secret: "s2" },
        { id: "3", email: "c@example.test", secret: null },
      ]);
    });

    test("draws and reports a seed when none is given", async () => {
      const code = await run(input, output, "--json");

      expect(code).toBe(EXIT_SUCCESS);
      const report = printedReport();
      expect(report.seedSource).toBe("random");
      expect(Number.isSafeInteger(report.seed)).toBe(true);
    });

    test("reads settings from a configuration file, with options taking precedence", async () => {
      const configPath = join(dir, "mask.yaml");
      writeFileSync(configPath, "probability: 1\ncolumns: [email]\nseed: 3\n");

      const code = await run(input, output, "--config", configPath, "--columns", "secret", "--json");

      expect(code).toBe(EXIT_SUCCESS);
      expect(readFileSync(output, "utf-8")).toBe(
        "id,email,secret\n1,a@example.test,\n2,,\n3,c@example.test,\n"
      );
      const report = printedReport();
      expect(report.seed).toBe(3);
      expect(report.seedSource).toBe("config");
      expect(report.configFile).toBe(configPath);
    });

    test("dry run computes without writing", async () => {
      const code = await run(input, output, "-p", "1", "--dry-run", "--json");

      expect(code).toBe(EXIT_SUCCESS);
      expect(existsSync(output)).toBe(false);
      expect(printedReport().dryRun).toBe(true);
      expect(printedReport().summary.cellsReplaced).toBe(7);
    });

    test("rejects an out-of-range probability with exit code 2", async () => {
      const code = await run(input, output, "-p", "1.5", "--json");

      expect(code).toBe(EXIT_CONFIG_ERROR);
      expect(existsSync(output)).toBe(false);
      expect(errorOutput()).toHaveLength(1);
      expect(errorOutput()[0]).toContain("Probability must be between 0.0 and 1.0 (got 1.5)");
    });

    test("prints one line per violation", async () => {
      const code = await run(input, output, "-p", "2", "-c", "z", "--json");

      expect(code).toBe(EXIT_CONFIG_ERROR);
      const lines = errorOutput();
      expect(lines).toHaveLength(2);
      expect(lines[0]).toContain("Probability must be between 0.0 and 1.0 (got 2)");
      expect(lines[1]).toContain('Column "z" not found in dataset (available: id, email, secret)');
    });

    test("rejects an empty column list with exit code 2", async () => {
      const code = await run(input, output, "-c", "", "--json");

      expect(code).toBe(EXIT_CONFIG_ERROR);
      expect(existsSync(output)).toBe(false);
      expect(errorOutput()).toHaveLength(1);
      expect(errorOutput()[0]).toContain("Column list is empty; omit it to select every column");
    });

    test("rejects an unknown column without writing output", async () => {
      const code = await run(input, output, "-c", "z", "--json");

      expect(code).toBe(EXIT_CONFIG_ERROR);
      expect(existsSync(output)).toBe(false);
    });

    test("rejects an invalid configuration file with exit code 2", async () => {
      const configPath = join(dir, "mask.yaml");
      writeFileSync(configPath, "probability: 0.5\nunknownKey: true\n");

      const code = await run(input, output, "--config", configPath, "--json");

      expect(code).toBe(EXIT_CONFIG_ERROR);
      expect(existsSync(output)).toBe(false);
    });

    test("rejects a non-positive concurrency with exit code 2", async () => {
      vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      expect(await run(input, output, "--concurrency", "0")).toBe(EXIT_CONFIG_ERROR);
    });

    test("reports a missing input file with exit code 3", async () => {
      const code = await run(join(dir, "missing.csv"), output, "--json");

      expect(code).toBe(EXIT_DATA_ERROR);
    });

    test("reports an unknown output extension with exit code 3", async () => {
      const code = await run(input, join(dir, "masked.xlsx"), "--json");

      expect(code).toBe(EXIT_DATA_ERROR);
      expect(errorOutput()[0]).toContain('Cannot infer dataset format from "');
    });

    test("reports a ragged input file with exit code 3", async () => {
      writeFileSync(input, "a,b\n1,2,3\n");

      expect(await run(input, output, "--json")).toBe(EXIT_DATA_ERROR);
    });
  });
});
