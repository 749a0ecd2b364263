/**
 * Gzip support for marker FASTA files and tables
 *
 * Detection looks at magic bytes first and the file extension second;
 * compression itself goes through node:zlib.
 */

import { promisify } from "node:util";
import { gunzip, gzip } from "node:zlib";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { CompressionFormat } from "../types";

const GZIP_MAGIC_BYTE1 = 0x1f;
const GZIP_MAGIC_BYTE2 = 0x8b;

const gunzipAsync = promisify(gunzip);
const gzipAsync = promisify(gzip);

function fromMagicBytes(bytes: Uint8Array): CompressionFormat {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC_BYTE1 && bytes[1] === GZIP_MAGIC_BYTE2
    ? "gzip"
    : "none";
}

function fromExtension(filePath: string): CompressionFormat {
  return filePath.toLowerCase().endsWith(".gz") ? "gzip" : "none";
}

/**
 * Decompress gzip data read from `filePath`
 */
function decompress(data: Uint8Array, filePath: string): Effect.Effect<Uint8Array, FileError> {
  return Effect.tryPromise({
    try: async () => new Uint8Array(await gunzipAsync(data)),
    catch: (error) => FileError.fromSystemError("read", filePath, error),
  });
}

function compress(
  data: Uint8Array,
  filePath: string,
  level: number
): Effect.Effect<Uint8Array, FileError> {
  return Effect.tryPromise({
    try: async () => new Uint8Array(await gzipAsync(data, { level })),
    catch: (error) => FileError.fromSystemError("write", filePath, error),
  });
}

export const CompressionDetector = { fromMagicBytes, fromExtension } as const;

export { compress, decompress };
