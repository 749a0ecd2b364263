/**
 * KmerSet: deduplicated fixed-length substrings of a marker sequence
 *
 * A sequence is uppercased, windowed with stride 1, and every window that
 * contains a character outside the alphabet is dropped. DNA k-mers are
 * canonicalized so a sequence and its reverse complement share one set.
 *
 * @example
 * ```typescript
 * const kmers = KmerSet.fromSequence("MKVLAAGIVG", 8);
 * kmers.size; // 3
 * ```
 *
 * @module operations/kmer-set
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { KmerSizeSchema, type KmerAlphabet } from "../types";
import { canonicalKmer, isAlphabetKmer } from "./core/sequence-manipulation";

/**
 * Validate a k-mer size, raising {@link ValidationError} when it is not a
 * positive integer
 */
function validateKmerSize(k: number): number {
  const result = KmerSizeSchema(k);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid kmer size ${k}: ${result.summary}`);
  }
  return result;
}

/**
 * Extract the k-mer set of a sequence
 *
 * Windows start at 0..len-k inclusive. A sequence no longer than k yields the
 * empty set.
 */
function extractKmers(
  sequence: string,
  k: number,
  alphabet: KmerAlphabet = "protein"
): ReadonlySet<string> {
  validateKmerSize(k);

  const kmers = new Set<string>();
  if (sequence.length <= k) {
    return kmers;
  }

  const upper = sequence.toUpperCase();
  const last = upper.length - k;
  for (let i = 0; i <= last; i++) {
    const kmer = upper.substring(i, i + k);
    if (!isAlphabetKmer(kmer, alphabet)) continue;
    kmers.add(alphabet === "dna" ? canonicalKmer(kmer) : kmer);
  }

  return kmers;
}

/**
 * Immutable k-mer set tagged with its k and alphabet
 */
class KmerSet implements Iterable<string> {
  private constructor(
    readonly k: number,
    readonly alphabet: KmerAlphabet,
    readonly kmers: ReadonlySet<string>
  ) {}

  static fromSequence(sequence: string, k: number, alphabet: KmerAlphabet = "protein"): KmerSet {
    return new KmerSet(k, alphabet, extractKmers(sequence, k, alphabet));
  }

  static fromKmers(kmers: Iterable<string>, k: number, alphabet: KmerAlphabet = "protein"): KmerSet {
    validateKmerSize(k);
    const set = new Set<string>();
    for (const kmer of kmers) {
      if (kmer.length !== k) {
        throw new ValidationError(`Kmer '${kmer}' does not have length ${k}`);
      }
      set.add(kmer);
    }
    return new KmerSet(k, alphabet, set);
  }

  get size(): number {
    return this.kmers.size;
  }

  has(kmer: string): boolean {
    return this.kmers.has(kmer);
  }

  /** Sorted k-mers */
  toArray(): string[] {
    return [...this.kmers].sort();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.kmers[Symbol.iterator]();
  }
}

/**
 * An empty k-mer set carries no similarity signal: callers report the query
 * as indeterminate rather than as zero similarity
 */
function isIndeterminate(kmers: KmerSet | ReadonlySet<string>): boolean {
  return kmers.size === 0;
}

export { extractKmers, isIndeterminate, KmerSet, validateKmerSize };
