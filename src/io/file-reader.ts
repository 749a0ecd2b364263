/**
 * File reading utilities
 *
 * Promise-based API over Effect programs wrapping node:fs. Failures surface as
 * {@link FileError} with the failing path and a remediation hint.
 */

import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import { type } from "arktype";
import { Effect, Either } from "effect";
import { FileError } from "../errors";
import type { FileMetadata, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { CompressionDetector, decompress } from "./compression";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  encoding: "utf8",
  maxFileSize: 1_073_741_824, // 1GB
  autoDecompress: true,
  compressionFormat: "none", // auto-detected
};

/**
 * Run a file program, rethrowing its typed failure as-is
 *
 * @internal Shared with the file writer
 */
export async function runFileEffect<A>(program: Effect.Effect<A, FileError>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(program));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

function statEffect(path: string): Effect.Effect<Stats, FileError> {
  return Effect.tryPromise({
    try: () => fs.stat(path),
    catch: (error) => FileError.fromSystemError("stat", path, error),
  });
}

/**
 * Check whether a path names a readable regular file
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);
  const program = statEffect(validatedPath).pipe(
    Effect.map((info) => info.isFile()),
    Effect.orElseSucceed(() => false)
  );
  return runFileEffect(program);
}

/**
 * Check whether a path names a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);
  const program = statEffect(validatedPath).pipe(
    Effect.map((info) => info.isDirectory()),
    Effect.orElseSucceed(() => false)
  );
  return runFileEffect(program);
}

/**
 * @throws {FileError} If the path cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);
  const program = statEffect(validatedPath).pipe(
    Effect.map((info) => ({
      path: validatedPath,
      size: Number(info.size),
      lastModified: info.mtime,
      isDirectory: info.isDirectory(),
    }))
  );
  return runFileEffect(program);
}

/**
 * Read a whole file, decompressing gzip content when detected
 *
 * @throws {FileError} If the file cannot be read or exceeds `maxFileSize`
 */
export async function readBytes(path: string, options: FileReaderOptions = {}): Promise<Uint8Array> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    const info = yield* statEffect(validatedPath);
    if (info.size > mergedOptions.maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${info.size} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
          validatedPath,
          "read"
        )
      );
    }

    const raw = yield* Effect.tryPromise({
      try: async () => new Uint8Array(await fs.readFile(validatedPath)),
      catch: (error) => FileError.fromSystemError("read", validatedPath, error),
    });

    if (!mergedOptions.autoDecompress) return raw;

    const format =
      mergedOptions.compressionFormat !== "none"
        ? mergedOptions.compressionFormat
        : CompressionDetector.fromMagicBytes(raw);
    return format === "gzip" ? yield* decompress(raw, validatedPath) : raw;
  });

  return runFileEffect(program);
}

/**
 * Read entire file to string
 *
 * @throws {FileError} If the file cannot be read or is too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const bytes = await readBytes(path, options);
  const encoding = mergeOptions(options).encoding;
  return Buffer.from(bytes).toString(encoding === "binary" ? "latin1" : encoding);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function validatePath(path: string): string {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file path: ${result.summary}`, path, "stat");
  }
  return result;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const result = FileReaderOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${result.summary}`, "", "read");
  }
  return { ...DEFAULT_OPTIONS, ...result };
}
