/**
 * Similarity scoring between k-mer sets
 *
 * The default strategy counts shared k-mers; thresholds such as "score 100 at
 * K=8" are calibrated against that count. The normalized strategies are for
 * ad-hoc comparison and are selected once, when the scorer is created.
 *
 * @module operations/similarity
 */

import type { KmerAlphabet, ScoringStrategy } from "../types";
import { kmerIntersectionSize } from "./core/kmer-sets";
import { KmerSet } from "./kmer-set";

type Kmers = KmerSet | ReadonlySet<string>;

function asSet(kmers: Kmers): ReadonlySet<string> {
  return kmers instanceof KmerSet ? kmers.kmers : kmers;
}

/**
 * Scores a query k-mer set against a reference k-mer set
 */
export interface SimilarityScorer {
  readonly strategy: ScoringStrategy;
  score(query: Kmers, reference: Kmers): number;
}

/**
 * Number of k-mers in common: |A ∩ B|
 *
 * Symmetric; `score(A, A) = |A|`.
 */
export function score(setA: Kmers, setB: Kmers): number {
  return kmerIntersectionSize(asSet(setA), asSet(setB));
}

/**
 * Extract both k-mer sets and count the k-mers they share
 */
export function scoreSequences(
  seqA: string,
  seqB: string,
  k: number,
  alphabet: KmerAlphabet = "protein"
): number {
  return score(KmerSet.fromSequence(seqA, k, alphabet), KmerSet.fromSequence(seqB, k, alphabet));
}

function scoreWith(strategy: ScoringStrategy, query: Kmers, reference: Kmers): number {
  const q = asSet(query);
  const r = asSet(reference);
  const shared = kmerIntersectionSize(q, r);

  switch (strategy.kind) {
    case "shared":
      return shared;
    case "raw":
      return q.size === 0 ? 0 : Math.floor((shared * 1000) / q.size);
    case "scaled":
      return q.size === 0 || r.size === 0
        ? 0
        : Math.floor((shared * 1_000_000) / (q.size * r.size));
  }
}

/**
 * Create a scorer for one strategy
 *
 * @example
 * ```typescript
 * const scorer = createScorer({ kind: "raw" });
 * scorer.score(query, reference); // shared k-mers per thousand query k-mers
 * ```
 */
export function createScorer(strategy: ScoringStrategy = { kind: "shared" }): SimilarityScorer {
  return {
    strategy,
    score: (query, reference) => scoreWith(strategy, query, reference),
  };
}
