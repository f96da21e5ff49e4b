/**
 * Commander.js program with subcommand routing, and the error report that
 * turns a failed command into a non-zero exit.
 */

import { Command } from "commander";
import pc from "picocolors";
import { createStartCommand } from "./commands/start.js";
import { createListCommand } from "./commands/list.js";
import { readGlobalFlags } from "./flags.js";
import { logger, setLogLevel } from "../utils/logger.js";
import { SproutError, formatErrorChain } from "../types/errors.js";

export const VERSION = "0.1.0";

const LONG_DESCRIPTION = `A simple tmux session starter.

Start, stop and manage pre-defined tmux sessions easily and declaratively.`;

export function createProgram(): Command {
  const program = new Command()
    .name("sprout")
    .description(LONG_DESCRIPTION)
    .version(VERSION, "-v, --version")
    .option("--verbose", "Enable debug logging");

  program.hook("preAction", (thisCommand) => {
    if (readGlobalFlags(thisCommand.opts()).verbose) {
      setLogLevel("debug");
    }
  });

  program.addCommand(createStartCommand());
  program.addCommand(createListCommand());

  return program;
}

/**
 * Print the error with its cause chain to stderr.
 */
export function reportError(error: unknown): void {
  const [message, ...causes] = formatErrorChain(error);
  process.stderr.write(pc.red(`Error: ${message ?? "unknown error"}\n`));
  for (const cause of causes) {
    process.stderr.write(pc.red(`  caused by: ${cause}\n`));
  }
  if (error instanceof SproutError) {
    if (error.diagnosticMessage !== undefined) {
      process.stderr.write(`${error.diagnosticMessage}\n`);
    }
    if (error.suggestedRecovery !== undefined) {
      process.stderr.write(pc.dim(`${error.suggestedRecovery}\n`));
    }
  }
}

/**
 * Run the program against `argv` and resolve with the process exit code.
 */
export async function run(argv: readonly string[]): Promise<number> {
  try {
    await createProgram().parseAsync([...argv]);
    return 0;
  } catch (error: unknown) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, "CLI error");
    reportError(error);
    return 1;
  }
}
