/**
 * Stream processing utilities
 *
 * Turns byte or text streams (a Node Readable, standard input, a web
 * ReadableStream) into complete lines with proper buffering across chunk
 * boundaries.
 */

import { ParseError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 1_000_000_000;

/**
 * Chunks from a Node Readable or any async source of bytes or text
 */
export type ChunkSource = AsyncIterable<Uint8Array | string>;

/**
 * Convert a chunk source into an async iterable of lines
 *
 * A trailing line without a newline is still yielded.
 *
 * @example
 * ```typescript
 * for await (const line of readLines(process.stdin)) {
 *   if (line.startsWith(">")) console.log("Found header:", line);
 * }
 * ```
 */
export async function* readLines(source: ChunkSource): AsyncIterable<string> {
  const decoder = new TextDecoder("utf-8");
  let buffer = "";

  for await (const chunk of source) {
    buffer += typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
    const result = processBuffer(buffer);
    buffer = result.remainder;
    yield* result.lines;
  }

  buffer += decoder.decode();
  const result = processBuffer(buffer);
  yield* result.lines;
  if (result.remainder !== "") {
    yield result.remainder.endsWith("\r") ? result.remainder.slice(0, -1) : result.remainder;
  }
}

/**
 * Read a whole chunk source into a string
 */
export async function readAll(source: ChunkSource): Promise<string> {
  const decoder = new TextDecoder("utf-8");
  let text = "";
  for await (const chunk of source) {
    text += typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}

/**
 * Split a text buffer into complete lines plus the unterminated remainder
 *
 * Handles \n and \r\n line endings.
 *
 * @throws {ParseError} If a single line exceeds the maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  let newline = buffer.indexOf("\n", lineStart);
  while (newline !== -1) {
    const lineEnd = newline > lineStart && buffer[newline - 1] === "\r" ? newline - 1 : newline;
    const line = buffer.slice(lineStart, lineEnd);
    if (line.length > MAX_LINE_LENGTH) {
      throw new ParseError(
        `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
        "text",
        undefined,
        `Line starts with: ${line.slice(0, 100)}...`
      );
    }
    lines.push(line);
    lineStart = newline + 1;
    newline = buffer.indexOf("\n", lineStart);
  }

  return { lines, remainder: buffer.slice(lineStart) };
}
