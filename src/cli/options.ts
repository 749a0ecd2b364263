/**
 * CLI global options, I/O streams and logging
 *
 * @module cli/options
 */

import { InvalidArgumentError } from "commander";
import type { ChunkSource } from "../io/stream-utils";

export interface GlobalOptions {
  quiet: boolean;
  verbose: boolean;
}

/**
 * Where a CLI run reads queries from and writes output to
 */
export interface CliIO {
  readonly stdin: ChunkSource;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

export interface Logger {
  info: (msg: string) => void;
  debug: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
}

export function processIO(): CliIO {
  return {
    stdin: process.stdin,
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
  };
}

/**
 * Parse global options from commander's option values
 */
export function parseGlobalOptions(opts: Record<string, unknown>): GlobalOptions {
  return {
    quiet: opts["quiet"] === true,
    verbose: opts["verbose"] === true,
  };
}

/**
 * Logging that respects quiet/verbose flags
 *
 * Everything goes to stderr; stdout carries only report output.
 */
export function createLogger(options: GlobalOptions, write: (text: string) => void): Logger {
  return {
    info: (msg) => {
      if (!options.quiet) write(`${msg}\n`);
    },
    debug: (msg) => {
      if (options.verbose) write(`[DEBUG] ${msg}\n`);
    },
    warn: (msg) => {
      if (!options.quiet) write(`[WARN] ${msg}\n`);
    },
    error: (msg) => {
      write(`[ERROR] ${msg}\n`);
    },
  };
}

/**
 * Commander argument parser for non-negative integers
 */
export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got '${value}'.`);
  }
  return Number(value);
}

export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError("Expected a positive integer, got '0'.");
  }
  return parsed;
}
