/**
 * Tab-delimited tables: complete.genomes, rep_db.tbl, K, and report output
 *
 * These files carry no quoting. The parser splits on tabs only; the writer
 * replaces embedded tabs and newlines with spaces so every row keeps its shape.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { readToString } from "../io/file-reader";
import { writeString } from "../io/file-writer";
import { readLines, type ChunkSource } from "../io/stream-utils";
import type { FileReaderOptions, ParserOptions, WriteOptions } from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * One data line of a tab-delimited file
 */
export interface TsvRow {
  readonly fields: readonly string[];
  readonly lineNumber: number;
}

export interface TsvParserOptions extends ParserOptions {
  /** Treat the first non-blank line as a header and skip it (default: false) */
  header?: boolean;
  /** Lines starting with this prefix are skipped (default: none) */
  commentPrefix?: string;
  /** Rows with fewer fields are reported through onWarning and skipped (default: 1) */
  minColumns?: number;
}

type TsvField = string | number | boolean | null | undefined;

const TsvParserOptionsSchema = type({
  "header?": "boolean",
  "commentPrefix?": "string>0",
  "minColumns?": "number.integer>=1",
});

class TsvParser extends AbstractParser<TsvRow> {
  private readonly header: boolean;
  private readonly commentPrefix: string | undefined;
  private readonly minColumns: number;

  protected getDefaultOptions(): Partial<ParserOptions> {
    return {
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`TSV Warning (line ${lineNumber}): ${warning}`);
      },
    };
  }

  constructor(options: TsvParserOptions = {}) {
    const validationResult = TsvParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid TSV parser options: ${validationResult.summary}`);
    }
    super(options);
    this.header = options.header ?? false;
    this.commentPrefix = options.commentPrefix;
    this.minColumns = options.minColumns ?? 1;
  }

  protected getFormatName(): string {
    return "TSV";
  }

  async *parseString(data: string): AsyncIterable<TsvRow> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<TsvRow> {
    const content = await readToString(filePath, options);
    yield* this.parseString(content);
  }

  async *parse(source: ChunkSource): AsyncIterable<TsvRow> {
    yield* this.parseLines(readLines(source));
  }

  private async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<TsvRow> {
    let lineNumber = 0;
    let headerPending = this.header;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();

      if (line.trim() === "") continue;
      if (this.commentPrefix !== undefined && line.startsWith(this.commentPrefix)) continue;
      if (headerPending) {
        headerPending = false;
        continue;
      }

      const fields = line.split("\t");
      if (fields.length < this.minColumns) {
        this.options.onWarning(
          `Expected at least ${this.minColumns} columns, found ${fields.length}`,
          lineNumber
        );
        continue;
      }
      yield { fields, lineNumber };
    }
  }
}

/**
 * Tab-delimited writer
 */
class TsvWriter {
  private readonly columns: readonly string[] | undefined;

  /**
   * @param columns Header row, written first by {@link formatRows} when given
   */
  constructor(columns?: readonly string[]) {
    this.columns = columns;
  }

  formatField(field: TsvField): string {
    if (field === null || field === undefined) return "";
    return String(field).replace(/[\t\r\n]+/g, " ");
  }

  formatRow(fields: readonly TsvField[]): string {
    return fields.map((field) => this.formatField(field)).join("\t");
  }

  /**
   * Header (if any) plus one line per row, each newline-terminated
   */
  formatRows(rows: Iterable<readonly TsvField[]>): string {
    let result = this.columns !== undefined ? `${this.formatRow(this.columns)}\n` : "";
    for (const row of rows) {
      result += `${this.formatRow(row)}\n`;
    }
    return result;
  }

  async writeFile(
    path: string,
    rows: Iterable<readonly TsvField[]>,
    options: WriteOptions = {}
  ): Promise<void> {
    await writeString(path, this.formatRows(rows), options);
  }
}

export { TsvParser, TsvWriter };
export type { TsvField };
