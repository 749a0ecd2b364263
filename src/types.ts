/**
 * Core type definitions for marker sequences and representative-genome indexes
 *
 * Runtime schemas are ArkType types; the matching TypeScript interfaces are
 * declared next to them so callers can use either.
 */

import { type } from "arktype";

/**
 * Base interface for any identified biological sequence
 */
export interface AbstractSequence {
  /** Sequence identifier (genome ID or feature ID) */
  readonly id: string;
  /** Optional description/comment line */
  readonly description?: string;
  /** The actual sequence data */
  readonly sequence: string;
  /** Cached sequence length */
  readonly length: number;
  /** Original line number where this sequence started (for error reporting) */
  readonly lineNumber?: number;
}

/**
 * FASTA sequence representation
 * Format: >id description\nsequence
 */
export interface FastaSequence extends AbstractSequence {
  readonly format: "fasta";
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Skip validation for performance (dangerous but fast) */
  skipValidation?: boolean;
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** Whether to preserve original line numbers */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats understood by the file reader and writer
 */
export type CompressionFormat = "gzip" | "none";

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: "utf8" | "binary" | "ascii";
  /** Maximum file size to prevent memory exhaustion (default: 1GB) */
  readonly maxFileSize?: number;
  /** Whether to detect and decompress gzip files (default: true) */
  readonly autoDecompress?: boolean;
  /** Override compression format detection (default: auto-detect) */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * File writing configuration options
 */
export interface WriteOptions {
  /** Compress based on file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Override compression format detection */
  readonly compressionFormat?: CompressionFormat;
  /** Compression level 1-9 (default: 6) */
  readonly compressionLevel?: number;
}

/**
 * File metadata for a path on disk
 */
export interface FileMetadata {
  readonly path: string;
  readonly size: number;
  readonly lastModified: Date;
  readonly isDirectory: boolean;
}

/**
 * Result of splitting a text buffer into complete lines
 */
export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

// =============================================================================
// K-MER AND INDEX TYPES
// =============================================================================

/**
 * Alphabet a k-mer set is drawn from
 *
 * Protein k-mers keep only the 20 standard residues; DNA k-mers keep ACGT and
 * are canonicalized against their reverse complement.
 */
export type KmerAlphabet = "protein" | "dna";

/**
 * Closed set of similarity scoring strategies
 *
 * - `shared`: number of k-mers in common (the calibrated default)
 * - `raw`: shared k-mers per thousand query k-mers
 * - `scaled`: shared k-mers per million (query × reference) k-mer pairs
 */
export type ScoringStrategy =
  | { readonly kind: "shared" }
  | { readonly kind: "raw" }
  | { readonly kind: "scaled" };

export type ScoringKind = ScoringStrategy["kind"];

/**
 * Construction options for a representative-genome index
 */
export interface RepIndexOptions {
  /** Kmer size (default 8) */
  readonly kmerSize?: number;
  /** Minimum score for a genome to count as represented (default 100) */
  readonly minScore?: number;
  /** Alphabet of the marker sequences (default "protein") */
  readonly alphabet?: KmerAlphabet;
  /** Scoring strategy (default shared-kmer count) */
  readonly scoring?: ScoringStrategy;
}

/**
 * Parameters persisted in a directory's `K` file
 */
export interface IndexParameters {
  readonly kmerSize: number;
  readonly minScore: number;
  /** Present only when the file names one; absent means protein */
  readonly alphabet?: KmerAlphabet;
}

/**
 * One representative scored against a query
 */
export interface GenomeMatch {
  readonly genomeId: string;
  readonly score: number;
}

/**
 * A genome recorded as represented, with its similarity to the representative
 */
export interface RepresentedEntry {
  readonly genomeId: string;
  readonly score: number;
}

/**
 * Input record for batch construction
 */
export interface MarkerRecord {
  readonly genomeId: string;
  readonly name: string;
  readonly sequence: string;
}

/**
 * Options for loading an index from a directory
 */
export interface LoadIndexOptions {
  /** Skip reading rep_db.tbl, leaving every representative with an empty group */
  readonly unconnected?: boolean;
  /** Alphabet of the marker FASTA when the `K` file does not name one (default "protein") */
  readonly alphabet?: KmerAlphabet;
  /** Scoring strategy for the loaded index */
  readonly scoring?: ScoringStrategy;
  /** Called for every skipped record or row */
  readonly onWarning?: (warning: string, lineNumber?: number) => void;
  /** Called with progress messages during long loads */
  readonly onProgress?: (message: string) => void;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Sequence identifiers: non-empty, no whitespace
 */
export const SequenceIdSchema = type(/^\S+$/);

/**
 * Marker sequence: letters plus the stop and gap characters that appear in
 * protein FASTA files
 */
export const MarkerSequenceSchema = type(/^[A-Za-z*\-.]+$/);

export const KmerSizeSchema = type("number.integer>=1");

export const MinScoreSchema = type("number.integer>=0");

export const ScoringStrategySchema = type({
  kind: "'shared'|'raw'|'scaled'",
});

export const RepIndexOptionsSchema = type({
  "kmerSize?": KmerSizeSchema,
  "minScore?": MinScoreSchema,
  "alphabet?": "'protein'|'dna'",
  "scoring?": ScoringStrategySchema,
});

export const IndexParametersSchema = type({
  kmerSize: KmerSizeSchema,
  minScore: MinScoreSchema,
  "alphabet?": "'protein'|'dna'",
});

export const LoadIndexOptionsSchema = type({
  "unconnected?": "boolean",
  "alphabet?": "'protein'|'dna'",
  "scoring?": ScoringStrategySchema,
});

/**
 * File path validation: non-empty and free of null bytes
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: JSON.stringify(path),
    });
  }
  return true;
});

export const FileReaderOptionsSchema = type({
  "encoding?": "'utf8'|'binary'|'ascii'",
  "maxFileSize?": "number>0",
  "autoDecompress?": "boolean",
  "compressionFormat?": "'gzip'|'none'",
});
