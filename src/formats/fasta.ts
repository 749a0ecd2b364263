/**
 * FASTA format parser and writer
 *
 * Handles the messiness of real-world marker-protein FASTA files:
 * - Wrapped and unwrapped sequences
 * - Missing or malformed headers
 * - Mixed case sequences
 * - Comments and blank lines
 * - Gzip-compressed input
 */

import { type } from "arktype";
import { ParseError, ValidationError } from "../errors";
import { readToString } from "../io/file-reader";
import { readLines, type ChunkSource } from "../io/stream-utils";
import type { FastaSequence, FileReaderOptions, ParserOptions } from "../types";
import { MarkerSequenceSchema, SequenceIdSchema } from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * Discriminated union for processed FASTA lines
 */
type ProcessedFastaLine =
  | { isHeader: true; id: string; description?: string }
  | { isHeader: false; sequenceData: string }
  | null;

interface PendingRecord {
  id: string;
  description?: string;
  lineNumber: number;
  chunks: string[];
  /** Set when one of the record's lines failed to parse */
  invalid: boolean;
}

const FastaParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
});

/**
 * Streaming FASTA parser
 *
 * Processes records one at a time. Lines starting with `;` and blank lines are
 * ignored; records without any sequence are reported through `onWarning` and
 * skipped. When `onError` does not throw, a record with a bad header or
 * sequence line is skipped whole rather than yielded truncated.
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * for await (const sequence of parser.parseFile("reps/6.1.1.20.fasta")) {
 *   console.log(`${sequence.id}: ${sequence.length} aa`);
 * }
 * ```
 */
class FastaParser extends AbstractParser<FastaSequence> {
  protected getDefaultOptions(): Partial<ParserOptions> {
    return {
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, "FASTA", lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`FASTA Warning (line ${lineNumber}): ${warning}`);
      },
    };
  }

  constructor(options: ParserOptions = {}) {
    const validationResult = FastaParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  /**
   * @example
   * ```typescript
   * for await (const sequence of parser.parseString(">83333.1\nMKVLAAGIVG\n")) {
   *   console.log(sequence.id); // "83333.1"
   * }
   * ```
   */
  async *parseString(data: string): AsyncIterable<FastaSequence> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * @throws {FileError} When the file cannot be read
   * @throws {ParseError} When the FASTA content is invalid
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<FastaSequence> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }

    const content = await readToString(filePath, options);
    yield* this.parseString(content);
  }

  async *parse(source: ChunkSource): AsyncIterable<FastaSequence> {
    yield* this.parseLines(readLines(source));
  }

  private async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<FastaSequence> {
    let pending: PendingRecord | undefined;
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();

      let processed: ProcessedFastaLine;
      try {
        processed = this.processLine(line, lineNumber);
      } catch (error) {
        this.options.onError(error instanceof Error ? error.message : String(error), lineNumber);
        if (line.trimStart().startsWith(">")) {
          if (pending !== undefined) {
            const record = this.finalizeRecord(pending);
            if (record !== undefined) yield record;
          }
          pending = { id: "", lineNumber, chunks: [], invalid: true };
        } else if (pending !== undefined) {
          pending.invalid = true;
        }
        continue;
      }
      if (processed === null) continue;

      if (processed.isHeader) {
        if (pending !== undefined) {
          const record = this.finalizeRecord(pending);
          if (record !== undefined) yield record;
        }
        pending = { id: processed.id, lineNumber, chunks: [], invalid: false };
        if (processed.description !== undefined) pending.description = processed.description;
      } else if (pending === undefined) {
        this.options.onError("Sequence data found before any header", lineNumber);
      } else {
        pending.chunks.push(processed.sequenceData);
      }
    }

    if (pending !== undefined) {
      const record = this.finalizeRecord(pending);
      if (record !== undefined) yield record;
    }
  }

  private processLine(line: string, lineNumber: number): ProcessedFastaLine {
    if (line.length > this.options.maxLineLength) {
      throw new ParseError(
        `Line too long (${line.length} > ${this.options.maxLineLength})`,
        "FASTA",
        lineNumber
      );
    }

    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith(";")) return null;

    if (trimmed.startsWith(">")) {
      return {
        isHeader: true,
        ...parseFastaHeader(trimmed, lineNumber, {
          skipValidation: this.options.skipValidation,
        }),
      };
    }

    const sequenceData = trimmed.replace(/\s/g, "");
    if (!this.options.skipValidation && MarkerSequenceSchema(sequenceData) instanceof type.errors) {
      throw new ParseError(`Invalid sequence characters in '${truncate(sequenceData)}'`, "FASTA", lineNumber);
    }
    return { isHeader: false, sequenceData };
  }

  private finalizeRecord(pending: PendingRecord): FastaSequence | undefined {
    if (pending.invalid) {
      this.options.onWarning(
        pending.id === ""
          ? "Record skipped after an invalid header"
          : `Sequence '${pending.id}' skipped after an invalid line`,
        pending.lineNumber
      );
      return undefined;
    }

    const sequence = pending.chunks.join("");
    if (sequence.length === 0) {
      this.options.onWarning(`Sequence '${pending.id}' is empty`, pending.lineNumber);
      return undefined;
    }

    return {
      format: "fasta",
      id: pending.id,
      ...(pending.description !== undefined ? { description: pending.description } : {}),
      sequence,
      length: sequence.length,
      ...(this.options.trackLineNumbers ? { lineNumber: pending.lineNumber } : {}),
    };
  }
}

/**
 * FASTA writer
 *
 * A `lineWidth` of 0 writes each sequence on one line.
 */
class FastaWriter {
  private readonly lineWidth: number;

  constructor(options: { lineWidth?: number } = {}) {
    const lineWidth = options.lineWidth ?? 80;
    if (!Number.isInteger(lineWidth) || lineWidth < 0) {
      throw new ValidationError(`lineWidth must be a non-negative integer, got ${lineWidth}`);
    }
    this.lineWidth = lineWidth;
  }

  formatSequence(sequence: Pick<FastaSequence, "id" | "description" | "sequence">): string {
    const header =
      sequence.description !== undefined && sequence.description !== ""
        ? `>${sequence.id} ${sequence.description}`
        : `>${sequence.id}`;
    return `${header}\n${this.wrapText(sequence.sequence)}\n`;
  }

  formatSequences(sequences: Iterable<Pick<FastaSequence, "id" | "description" | "sequence">>): string {
    let result = "";
    for (const sequence of sequences) {
      result += this.formatSequence(sequence);
    }
    return result;
  }

  private wrapText(text: string): string {
    if (this.lineWidth === 0 || text.length <= this.lineWidth) return text;
    const lines: string[] = [];
    for (let i = 0; i < text.length; i += this.lineWidth) {
      lines.push(text.slice(i, i + this.lineWidth));
    }
    return lines.join("\n");
  }
}

/**
 * Split a header line into ID and description
 *
 * @throws {ParseError} When the header has no identifier
 */
function parseFastaHeader(
  headerLine: string,
  lineNumber: number,
  options: { skipValidation?: boolean } = {}
): { id: string; description?: string } {
  const header = headerLine.slice(1).trim();
  if (header === "") {
    throw new ParseError("Empty FASTA header: header must contain an identifier", "FASTA", lineNumber);
  }

  const firstSpace = header.search(/\s/);
  const id = firstSpace === -1 ? header : header.slice(0, firstSpace);
  const description = firstSpace === -1 ? undefined : header.slice(firstSpace + 1).trim();

  if (options.skipValidation !== true && SequenceIdSchema(id) instanceof type.errors) {
    throw new ParseError(`Invalid sequence ID '${id}'`, "FASTA", lineNumber);
  }

  return description !== undefined && description !== "" ? { id, description } : { id };
}

function truncate(text: string, max = 40): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export { FastaParser, FastaWriter, parseFastaHeader };
