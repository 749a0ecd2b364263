/**
 * File writing operations
 *
 * Effect programs over node:fs hidden behind Promise-based functions. Paths
 * ending in `.gz` are gzip-compressed unless `autoCompress` is off.
 *
 * @module file-writer
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { WriteOptions } from "../types";
import { CompressionDetector, compress } from "./compression";
import { runFileEffect } from "./file-reader";

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function applyCompression(
  data: Uint8Array,
  filePath: string,
  options: WriteOptions
): Effect.Effect<Uint8Array, FileError> {
  if (!(options.autoCompress ?? true)) {
    return Effect.succeed(data);
  }

  const format =
    options.compressionFormat !== undefined && options.compressionFormat !== "none"
      ? options.compressionFormat
      : CompressionDetector.fromExtension(filePath);

  return format === "gzip"
    ? compress(data, filePath, options.compressionLevel ?? 6)
    : Effect.succeed(data);
}

function mkdirEffect(directory: string): Effect.Effect<void, FileError> {
  return Effect.tryPromise({
    try: async () => {
      await fs.mkdir(directory, { recursive: true });
    },
    catch: (error) => FileError.fromSystemError("mkdir", directory, error),
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a directory and any missing parents
 *
 * @throws {FileError}
 */
export async function ensureDirectory(directory: string): Promise<void> {
  return runFileEffect(mkdirEffect(directory));
}

/**
 * Write string to file (overwrites if exists, creates parent directories)
 *
 * @example
 * ```typescript
 * await writeString("reps/K", "8\n100\n");
 * await writeString("reps/6.1.1.20.fasta.gz", fasta); // gzip by extension
 * ```
 *
 * @throws {FileError} When the write fails
 */
export async function writeString(
  filePath: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const program = Effect.gen(function* () {
    yield* mkdirEffect(path.dirname(filePath));
    const data = yield* applyCompression(new TextEncoder().encode(content), filePath, options);
    yield* Effect.tryPromise({
      try: () => fs.writeFile(filePath, data),
      catch: (error) => FileError.fromSystemError("write", filePath, error),
    });
  });

  return runFileEffect(program);
}

/**
 * Write lines, each terminated by a newline
 */
export async function writeLines(
  filePath: string,
  lines: Iterable<string>,
  options: WriteOptions = {}
): Promise<void> {
  let content = "";
  for (const line of lines) {
    content += `${line}\n`;
  }
  return writeString(filePath, content, options);
}
