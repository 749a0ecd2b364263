/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Gives the FASTA and tab-delimited parsers consistent AbortSignal support
 * and the same error/warning callback defaults without imposing parsing
 * implementation details.
 */

import { ParseError } from "../errors";
import type { ChunkSource } from "../io/stream-utils";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Parser options after defaults have been applied
 */
export type ResolvedParserOptions = Required<Omit<ParserOptions, "signal">> &
  Pick<ParserOptions, "signal">;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T> {
  protected readonly options: ResolvedParserOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: ParserOptions = {}) {
    const baseDefaults: ResolvedParserOptions = {
      skipValidation: false,
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...definedOnly(options) };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<ParserOptions>;

  /**
   * Check if parsing should be aborted; call this in parsing loops
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  /**
   * Parse records from a string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file (gzip detected automatically)
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a byte or text stream such as standard input
   */
  abstract parse(source: ChunkSource): AsyncIterable<T>;

  /**
   * Format name for error messages and logging (e.g. "FASTA")
   */
  protected abstract getFormatName(): string;
}

/**
 * Drop keys whose value is undefined so they do not mask defaults
 */
function definedOnly(options: ParserOptions): Partial<ParserOptions> {
  const result: Partial<ParserOptions> = {};
  if (options.skipValidation !== undefined) result.skipValidation = options.skipValidation;
  if (options.maxLineLength !== undefined) result.maxLineLength = options.maxLineLength;
  if (options.trackLineNumbers !== undefined) result.trackLineNumbers = options.trackLineNumbers;
  if (options.signal !== undefined) result.signal = options.signal;
  if (options.onError !== undefined) result.onError = options.onError;
  if (options.onWarning !== undefined) result.onWarning = options.onWarning;
  return result;
}

/**
 * AbortSignal integration for format parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted === true) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }
}
