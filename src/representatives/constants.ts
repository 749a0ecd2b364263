/**
 * Defaults and file names for representative-genome indexes
 */

export const DEFAULT_KMER_SIZE = 8;
export const DEFAULT_MIN_SCORE = 100;
export const DEFAULT_NEIGHBOR_SCORE = 25;
export const DEFAULT_COMMON_ROLE_PERCENT = 97;
export const DEFAULT_MIN_GROUP_SIZE = 100;
export const DEFAULT_VSS_TAIL_LENGTH = 12;
export const DEFAULT_VSS_MIN_SCORE = 200;

/** Reported as the representative of a query with no match */
export const NO_REPRESENTATIVE = "<none>";

// Directory layout
export const MARKER_FASTA_FILE = "6.1.1.20.fasta";
export const GENOME_NAMES_FILE = "complete.genomes";
export const PARAMETERS_FILE = "K";
export const REP_DB_FILE = "rep_db.tbl";
export const NEIGHBOR_LISTS_FILE = "repLists.tbl";
export const VSS_FILE = "vss";
