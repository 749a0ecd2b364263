/**
 * CLI Command Helpers
 *
 * Shared utilities for all command files.
 *
 * @module cli/commands/helpers
 */

import { type ArkErrors, type } from "arktype";
import type { Command } from "commander";
import { getErrorSuggestion, RepKmerError, ValidationError } from "../../errors";
import { FastaParser } from "../../formats/fasta";
import type { RepresentativeGenomeIndex } from "../../representatives/rep-genome-index";
import { loadIndex } from "../../representatives/persistence";
import type { FastaSequence } from "../../types";
import { createLogger, parseGlobalOptions, type CliIO, type GlobalOptions, type Logger } from "../options";

export interface CommandRuntime {
  readonly options: GlobalOptions;
  readonly logger: Logger;
  readonly io: CliIO;
}

export interface RunState {
  exitCode: number;
}

/**
 * Runs a command body with standard error handling
 */
export type Runner = (fn: (runtime: CommandRuntime) => Promise<void>) => Promise<void>;

/**
 * Create the runner every command action goes through
 *
 * Failures are logged with a remediation hint and recorded as exit code 1.
 */
export function createRunner(program: Command, io: CliIO, state: RunState): Runner {
  return async (fn) => {
    const options = parseGlobalOptions(program.opts());
    const logger = createLogger(options, io.stderr);
    try {
      await fn({ options, logger, io });
    } catch (error) {
      if (error instanceof RepKmerError) {
        logger.error(error.message);
        logger.debug(getErrorSuggestion(error));
      } else {
        logger.error(error instanceof Error ? error.message : String(error));
      }
      state.exitCode = 1;
    }
  };
}

/**
 * Load an index, routing warnings and progress through the logger
 */
export async function loadForCommand(
  directory: string,
  logger: Logger,
  options: { unconnected?: boolean } = {}
): Promise<RepresentativeGenomeIndex> {
  logger.debug(`Loading database from ${directory}.`);
  return loadIndex(directory, {
    ...options,
    onWarning: (warning, lineNumber) =>
      logger.warn(lineNumber === undefined ? warning : `line ${lineNumber}: ${warning}`),
    onProgress: (message) => logger.debug(message),
  });
}

/**
 * Query sequences from a FASTA file, or standard input when no file (or `-`)
 * is given
 */
export function readQueries(
  input: string | undefined,
  runtime: CommandRuntime
): AsyncIterable<FastaSequence> {
  const parser = new FastaParser({
    onWarning: (warning, lineNumber) => runtime.logger.warn(`FASTA line ${lineNumber}: ${warning}`),
  });
  return input === undefined || input === "-"
    ? parser.parse(runtime.io.stdin)
    : parser.parseFile(input);
}

/**
 * Parse a positional score argument
 *
 * @throws {ValidationError}
 */
export function parseScoreArgument(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`Invalid score ${value}.`);
  }
  return Number(value);
}

/**
 * Unwrap an arktype validation result for command options
 *
 * @throws {ValidationError}
 */
export function validOptions<T>(result: T | ArkErrors): T {
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid options: ${result.summary}`);
  }
  return result;
}
