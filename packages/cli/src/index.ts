/**
 * @nullmask/cli
 *
 * Command-line interface for nullmask.
 */

import { Command, CommanderError } from "commander";
import { configureInjectCommand } from "./commands/index.js";
import { EXIT_CONFIG_ERROR, EXIT_SUCCESS, handleError } from "./utils/index.js";

export const version = "0.1.0";

export type { GlobalOptions, CommandContext } from "./types.js";
export {
  DEFAULT_PROBABILITY,
  injectHandler,
  resolveInjectSettings,
  type InjectOptions,
  type InjectReport,
  type InjectSettings,
} from "./commands/inject/index.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("nullmask")
    .description("Inject nulls into tabular datasets, reproducibly")
    .version(version)
    // Set before commands are added so they inherit it
    .exitOverride();

  configureInjectCommand(program);

  return program;
}

/**
 * Parse arguments and run
 *
 * @returns The process exit code
 */
export async function main(argv: readonly string[] = process.argv): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
    return EXIT_SUCCESS;
  } catch (err) {
    if (err instanceof CommanderError) {
      if (
        err.code === "commander.helpDisplayed" ||
        err.code === "commander.help" ||
        err.code === "commander.version"
      ) {
        return EXIT_SUCCESS;
      }
      // Commander has already printed the usage problem
      return EXIT_CONFIG_ERROR;
    }
    return handleError(err);
  }
}
