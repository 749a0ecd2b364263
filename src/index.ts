/**
 * repkmer - representative genomes by shared marker-protein kmers
 *
 * Genomes are represented by a single marker protein. Two genomes are close
 * when their markers share many kmers; a representative set is a collection
 * of such markers, each standing in for the genomes connected to it.
 */

// Error types
export {
  DuplicateGenomeError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  MalformedDirectoryError,
  ParseError,
  RepKmerError,
  SequenceTooShortError,
  UnknownRepresentativeError,
  ValidationError,
} from "./errors";
// FASTA and TSV formats
export { FastaParser, FastaWriter, parseFastaHeader } from "./formats/fasta";
export { TsvParser, TsvWriter, type TsvField, type TsvParserOptions, type TsvRow } from "./formats/tsv";
// File I/O
export { exists, getMetadata, isDirectory, readBytes, readToString } from "./io/file-reader";
export { ensureDirectory, writeLines, writeString } from "./io/file-writer";
export { readAll, readLines, type ChunkSource } from "./io/stream-utils";
// Kmers and scoring
export {
  kmerContainment,
  kmerDifference,
  kmerIntersection,
  kmerIntersectionSize,
  kmerJaccard,
  kmerUnion,
} from "./operations/core/kmer-sets";
export { canonicalKmer, reverseComplement } from "./operations/core/sequence-manipulation";
export { extractKmers, isIndeterminate, KmerSet, validateKmerSize } from "./operations/kmer-set";
export { createScorer, score, scoreSequences, type SimilarityScorer } from "./operations/similarity";
// Representative sets
export * from "./representatives/constants";
export { genomeIdFromFeature, isGenomeId, normalizeQueryId } from "./representatives/genome-ids";
export {
  buildGroups,
  commonRoles,
  groupOf,
  groupStatistics,
  type BuildGroupsOptions,
  type CommonRoleOptions,
  type GroupSize,
  type GroupStatistics,
  type GroupSummary,
  type QueryGenome,
  type RepresentedGroup,
} from "./representatives/grouping";
export {
  mergeInto,
  type MergeOptions,
  type MergeResult,
  type UnrepresentableGenome,
} from "./representatives/merge";
export {
  loadIndex,
  markerGenomeId,
  parseParameters,
  readGenomeNames,
  readParameters,
  saveIndex,
} from "./representatives/persistence";
export { RepresentativeGenome } from "./representatives/rep-genome";
export {
  RepresentativeGenomeIndex,
  type InsertBatchOptions,
  type InsertBatchResult,
  type Query,
  type RepresentationRecord,
} from "./representatives/rep-genome-index";
export {
  classifyQueries,
  closestRepresentatives,
  countQueries,
  formatClassifications,
  formatNeighborLists,
  formatVerySimilarSets,
  neighborLists,
  queryDistances,
  representativeMatrix,
  verySimilarSets,
  type Classification,
  type NeighborList,
  type PairScore,
  type QueryCount,
  type VssOptions,
} from "./representatives/reports";
// CLI entry for embedding
export { runCli } from "./cli/program";
// Types and schemas
export type {
  AbstractSequence,
  CompressionFormat,
  FastaSequence,
  FileMetadata,
  FileReaderOptions,
  GenomeMatch,
  IndexParameters,
  KmerAlphabet,
  LoadIndexOptions,
  MarkerRecord,
  ParserOptions,
  RepIndexOptions,
  RepresentedEntry,
  ScoringKind,
  ScoringStrategy,
  WriteOptions,
} from "./types";
export {
  KmerSizeSchema,
  MarkerSequenceSchema,
  MinScoreSchema,
  RepIndexOptionsSchema,
  ScoringStrategySchema,
  SequenceIdSchema,
} from "./types";
