/**
 * Core sequence manipulation operations
 *
 * Complement and reverse-complement for nucleotide k-mers, plus the residue
 * alphabets used to filter k-mers before they enter a set.
 *
 * @module sequence-manipulation
 */

import type { KmerAlphabet } from "../../types";

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * The 20 standard amino acids
 */
const PROTEIN_RESIDUES = "ACDEFGHIKLMNPQRSTVWY";

const DNA_BASES = "ACGT";

/**
 * DNA complement mapping including IUPAC ambiguity codes
 */
const DNA_COMPLEMENT_MAP: Record<string, string> = {
  A: "T",
  T: "A",
  C: "G",
  G: "C",
  U: "A", // RNA
  R: "Y",
  Y: "R", // Purines <-> Pyrimidines
  S: "S",
  W: "W", // Self-complementary
  K: "M",
  M: "K", // Keto <-> Amino
  B: "V",
  V: "B", // Not A <-> Not T
  D: "H",
  H: "D", // Not C <-> Not G
  N: "N",
};

const ALPHABET_PATTERNS: Record<KmerAlphabet, RegExp> = {
  protein: new RegExp(`^[${PROTEIN_RESIDUES}]+$`),
  dna: new RegExp(`^[${DNA_BASES}]+$`),
};

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Generate the complement of a nucleotide sequence
 *
 * Unknown characters are kept as-is; case is preserved.
 *
 * @example
 * ```typescript
 * complement('ATCG'); // 'TAGC'
 * ```
 */
export function complement(sequence: string): string {
  let result = "";
  for (const base of sequence) {
    const comp = DNA_COMPLEMENT_MAP[base.toUpperCase()];
    if (comp === undefined) {
      result += base;
    } else {
      result += base === base.toLowerCase() ? comp.toLowerCase() : comp;
    }
  }
  return result;
}

/**
 * Reverse a sequence (simple string reversal)
 */
export function reverse(sequence: string): string {
  return sequence.split("").reverse().join("");
}

/**
 * Generate the reverse complement of a nucleotide sequence
 *
 * @example
 * ```typescript
 * reverseComplement('AACG'); // 'CGTT'
 * ```
 */
export function reverseComplement(sequence: string): string {
  return reverse(complement(sequence));
}

/**
 * Canonical form of a DNA k-mer: the lexicographically smaller of the k-mer
 * and its reverse complement
 */
export function canonicalKmer(kmer: string): string {
  const rc = reverseComplement(kmer);
  return rc < kmer ? rc : kmer;
}

/**
 * Whether every character of an (uppercase) k-mer belongs to the alphabet
 */
export function isAlphabetKmer(kmer: string, alphabet: KmerAlphabet): boolean {
  return ALPHABET_PATTERNS[alphabet].test(kmer);
}

export { DNA_BASES, PROTEIN_RESIDUES };
