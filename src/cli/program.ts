/**
 * repkmer program construction
 *
 * @module cli/program
 */

import { Command, CommanderError } from "commander";
import { registerCommands } from "./commands/index";
import { createRunner, type RunState } from "./commands/helpers";
import { processIO, type CliIO } from "./options";

export const VERSION = "0.1.0";

/**
 * Build the command tree; output and exit codes go through `io` and `state`
 */
export function createProgram(io: CliIO, state: RunState): Command {
  const program = new Command();

  program
    .name("repkmer")
    .description("Representative genomes by shared marker-protein kmers")
    .version(VERSION, "-v, --version", "Output the current version")
    .option("-q, --quiet", "Suppress non-essential output")
    .option("--verbose", "Enable verbose/debug output")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });

  registerCommands(program, createRunner(program, io, state));
  return program;
}

/**
 * Run the CLI on user arguments (no node/script prefix) and resolve to the
 * exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO()): Promise<number> {
  const state: RunState = { exitCode: 0 };
  const program = createProgram(io, state);
  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return state.exitCode;
}
