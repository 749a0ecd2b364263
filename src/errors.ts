/**
 * Error handling for representative-genome indexing
 *
 * Every error raised by the library extends {@link RepKmerError}, which carries
 * a machine-readable code plus optional line and context details for
 * reporting problems in marker FASTA files and directory tables.
 */

/**
 * Base error class for all repkmer errors
 */
export class RepKmerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "RepKmerError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or arguments
 */
export class ValidationError extends RepKmerError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends RepKmerError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends RepKmerError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * A representative-genome directory is missing required files
 */
export class MalformedDirectoryError extends RepKmerError {
  constructor(
    public readonly directory: string,
    public readonly missing: readonly string[],
    context?: string
  ) {
    super(
      `Directory '${directory}' is not a representative-genome directory: missing ${missing.join(", ")}`,
      "MALFORMED_DIRECTORY",
      undefined,
      context
    );
    this.name = "MalformedDirectoryError";
  }
}

/**
 * A genome ID was inserted twice
 */
export class DuplicateGenomeError extends RepKmerError {
  constructor(public readonly genomeId: string) {
    super(`Genome '${genomeId}' is already a representative`, "DUPLICATE_GENOME");
    this.name = "DuplicateGenomeError";
  }
}

/**
 * Marker sequence too short to yield a single k-mer
 */
export class SequenceTooShortError extends RepKmerError {
  constructor(
    public readonly genomeId: string,
    public readonly length: number,
    public readonly kmerSize: number
  ) {
    super(
      `Marker sequence for genome '${genomeId}' has length ${length}, which must exceed the kmer size ${kmerSize}`,
      "SEQUENCE_TOO_SHORT"
    );
    this.name = "SequenceTooShortError";
  }
}

/**
 * A connection named a representative that is not in the index
 */
export class UnknownRepresentativeError extends RepKmerError {
  constructor(public readonly representativeId: string) {
    super(
      `${representativeId} not found in representative-genome database`,
      "UNKNOWN_REPRESENTATIVE"
    );
    this.name = "UnknownRepresentativeError";
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  INVALID_FASTA_HEADER: 'FASTA headers must start with ">" followed by an identifier',
  MALFORMED_DIRECTORY:
    "A representative-genome directory needs 6.1.1.20.fasta and complete.genomes; K and rep_db.tbl are optional",
  DUPLICATE_GENOME: "Skip the record or remove the existing representative before inserting",
  SEQUENCE_TOO_SHORT: "Use a longer marker protein or rebuild the index with a smaller kmer size",
  UNKNOWN_REPRESENTATIVE: "Insert the representative genome before connecting genomes to it",
  INVALID_PARAMETERS: "The K file holds the kmer size on line 1 and the minimum score on line 2",
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: RepKmerError): string {
  switch (error.code) {
    case "MALFORMED_DIRECTORY":
      return ERROR_SUGGESTIONS.MALFORMED_DIRECTORY;
    case "DUPLICATE_GENOME":
      return ERROR_SUGGESTIONS.DUPLICATE_GENOME;
    case "SEQUENCE_TOO_SHORT":
      return ERROR_SUGGESTIONS.SEQUENCE_TOO_SHORT;
    case "UNKNOWN_REPRESENTATIVE":
      return ERROR_SUGGESTIONS.UNKNOWN_REPRESENTATIVE;
  }

  const message = error.message.toLowerCase();
  if (message.includes("fasta") && message.includes("header")) {
    return ERROR_SUGGESTIONS.INVALID_FASTA_HEADER;
  }
  if (message.includes("parameter")) {
    return ERROR_SUGGESTIONS.INVALID_PARAMETERS;
  }

  return ERROR_SUGGESTIONS.MALFORMED_LINE;
}
