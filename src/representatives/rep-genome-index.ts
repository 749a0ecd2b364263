/**
 * Representative-genome k-mer similarity index
 *
 * Holds one marker sequence per representative genome, in insertion order,
 * and answers "which representative is closest to this sequence" by k-mer set
 * overlap. Genomes that clear the threshold against a representative are
 * connected to it; each connected genome has exactly one representative.
 *
 * @example
 * ```typescript
 * const index = new RepresentativeGenomeIndex({ kmerSize: 8, minScore: 100 });
 * index.insert("83333.1", "Escherichia coli K-12", markerProtein);
 * const match = index.bestMatch(queryProtein);
 * if (match !== undefined && match.score >= index.minScore) {
 *   index.connect(match.genomeId, "562.2", match.score);
 * }
 * ```
 *
 * @module representatives/rep-genome-index
 */

import { type } from "arktype";
import {
  DuplicateGenomeError,
  SequenceTooShortError,
  UnknownRepresentativeError,
  ValidationError,
} from "../errors";
import { KmerSet } from "../operations/kmer-set";
import { createScorer, type SimilarityScorer } from "../operations/similarity";
import {
  RepIndexOptionsSchema,
  type GenomeMatch,
  type KmerAlphabet,
  type MarkerRecord,
  type RepIndexOptions,
  type RepresentedEntry,
} from "../types";
import { DEFAULT_KMER_SIZE, DEFAULT_MIN_SCORE } from "./constants";
import { RepresentativeGenome } from "./rep-genome";

/** A query given as a raw sequence or as a k-mer set computed by the caller */
export type Query = string | KmerSet;

export interface InsertBatchOptions {
  /** Called for each record that is skipped (default: console.warn) */
  onError?: (error: DuplicateGenomeError | SequenceTooShortError) => void;
}

export interface InsertBatchResult {
  inserted: number;
  skipped: number;
}

export interface RepresentationRecord {
  representativeId: string;
  score: number;
}

export class RepresentativeGenomeIndex implements Iterable<RepresentativeGenome> {
  readonly kmerSize: number;
  readonly minScore: number;
  readonly alphabet: KmerAlphabet;
  readonly scorer: SimilarityScorer;

  private readonly genomes = new Map<string, RepresentativeGenome>();
  private readonly order: string[] = [];
  // represented genome ID -> representative genome ID
  private readonly representedBy = new Map<string, string>();

  constructor(options: RepIndexOptions = {}) {
    const validated = RepIndexOptionsSchema(options);
    if (validated instanceof type.errors) {
      throw new ValidationError(`Invalid index options: ${validated.summary}`);
    }

    this.kmerSize = validated.kmerSize ?? DEFAULT_KMER_SIZE;
    this.minScore = validated.minScore ?? DEFAULT_MIN_SCORE;
    this.alphabet = validated.alphabet ?? "protein";
    this.scorer = createScorer(validated.scoring ?? { kind: "shared" });
  }

  get size(): number {
    return this.order.length;
  }

  /**
   * Add a representative genome
   *
   * @throws {DuplicateGenomeError} When the genome is already a representative
   * @throws {SequenceTooShortError} When the marker is not longer than K
   */
  insert(genomeId: string, name: string, markerSequence: string): RepresentativeGenome {
    if (this.genomes.has(genomeId)) {
      throw new DuplicateGenomeError(genomeId);
    }
    if (markerSequence.length <= this.kmerSize) {
      throw new SequenceTooShortError(genomeId, markerSequence.length, this.kmerSize);
    }

    const genome = new RepresentativeGenome(
      genomeId,
      name,
      markerSequence,
      this.kmerSize,
      this.alphabet
    );
    this.genomes.set(genomeId, genome);
    this.order.push(genomeId);
    return genome;
  }

  /**
   * Insert many records, skipping the ones that cannot be inserted
   */
  insertBatch(records: Iterable<MarkerRecord>, options: InsertBatchOptions = {}): InsertBatchResult {
    const onError =
      options.onError ??
      ((error: DuplicateGenomeError | SequenceTooShortError): void => {
        console.warn(`Index Warning: ${error.message}`);
      });

    let inserted = 0;
    let skipped = 0;
    for (const record of records) {
      try {
        this.insert(record.genomeId, record.name, record.sequence);
        inserted++;
      } catch (error) {
        if (error instanceof DuplicateGenomeError || error instanceof SequenceTooShortError) {
          onError(error);
          skipped++;
        } else {
          throw error;
        }
      }
    }
    return { inserted, skipped };
  }

  isRepresentative(genomeId: string): boolean {
    return this.genomes.has(genomeId);
  }

  get(genomeId: string): RepresentativeGenome | undefined {
    return this.genomes.get(genomeId);
  }

  /** Representative IDs in insertion order */
  ids(): readonly string[] {
    return [...this.order];
  }

  *[Symbol.iterator](): Iterator<RepresentativeGenome> {
    for (const id of this.order) {
      const genome = this.genomes.get(id);
      if (genome !== undefined) yield genome;
    }
  }

  /**
   * Compute a query's k-mer set with this index's K and alphabet
   */
  queryKmers(query: Query): KmerSet {
    if (typeof query === "string") {
      return KmerSet.fromSequence(query, this.kmerSize, this.alphabet);
    }
    if (query.k !== this.kmerSize || query.alphabet !== this.alphabet) {
      throw new ValidationError(
        `Query kmers (k=${query.k}, ${query.alphabet}) do not match the index (k=${this.kmerSize}, ${this.alphabet})`
      );
    }
    return query;
  }

  /**
   * Score a query against one representative
   */
  scoreAgainst(query: Query, genomeId: string): number {
    const genome = this.requireRepresentative(genomeId);
    return this.scorer.score(this.queryKmers(query), genome.kmers);
  }

  /**
   * The closest representative
   *
   * Ties go to the first-inserted representative. Returns undefined for an
   * empty index, a query whose k-mer set is empty, or a query sharing no
   * k-mers with any representative.
   */
  bestMatch(query: Query): GenomeMatch | undefined {
    const kmers = this.queryKmers(query);
    if (kmers.size === 0) return undefined;

    let best: GenomeMatch | undefined;
    for (const genome of this) {
      const score = this.scorer.score(kmers, genome.kmers);
      if (score > (best?.score ?? 0)) {
        best = { genomeId: genome.genomeId, score };
      }
    }
    return best;
  }

  /**
   * Every representative scoring at least `minScore`, in insertion order
   */
  matchesAbove(query: Query, minScore: number = this.minScore): Map<string, number> {
    const kmers = this.queryKmers(query);
    const matches = new Map<string, number>();
    if (kmers.size === 0) return matches;

    for (const genome of this) {
      const score = this.scorer.score(kmers, genome.kmers);
      if (score >= minScore) matches.set(genome.genomeId, score);
    }
    return matches;
  }

  countAbove(query: Query, minScore: number = this.minScore): number {
    const kmers = this.queryKmers(query);
    if (kmers.size === 0) return 0;

    let count = 0;
    for (const genome of this) {
      if (this.scorer.score(kmers, genome.kmers) >= minScore) count++;
    }
    return count;
  }

  /**
   * The top `n` representatives by descending score, ties in insertion order
   */
  bestMatches(query: Query, n: number, minScore = 0): GenomeMatch[] {
    const kmers = this.queryKmers(query);
    if (kmers.size === 0 || n <= 0) return [];

    const matches: GenomeMatch[] = [];
    for (const genome of this) {
      const score = this.scorer.score(kmers, genome.kmers);
      if (score >= minScore) matches.push({ genomeId: genome.genomeId, score });
    }
    // Array.prototype.sort is stable, so equal scores keep insertion order
    matches.sort((a, b) => b.score - a.score);
    return matches.slice(0, n);
  }

  /**
   * Record that `genomeId` is represented by `representativeId`
   *
   * A genome already connected elsewhere moves to the new representative.
   *
   * @throws {UnknownRepresentativeError}
   */
  connect(representativeId: string, genomeId: string, score: number): void {
    const representative = this.requireRepresentative(representativeId);

    const previous = this.representedBy.get(genomeId);
    if (previous !== undefined && previous !== representativeId) {
      this.genomes.get(previous)?.removeRepresented(genomeId);
    }
    representative.addRepresented(genomeId, score);
    this.representedBy.set(genomeId, representativeId);
  }

  /**
   * Drop every connection, keeping the representatives
   */
  clearConnections(): void {
    for (const [genomeId, repId] of this.representedBy) {
      this.genomes.get(repId)?.removeRepresented(genomeId);
    }
    this.representedBy.clear();
  }

  /**
   * @throws {UnknownRepresentativeError}
   */
  representedList(representativeId: string): ReadonlyArray<RepresentedEntry> {
    return this.requireRepresentative(representativeId).representedList();
  }

  /**
   * The recorded representative of a connected genome
   */
  checkRepresented(genomeId: string): RepresentationRecord | undefined {
    const representativeId = this.representedBy.get(genomeId);
    if (representativeId === undefined) return undefined;
    const score = this.genomes.get(representativeId)?.scoreOf(genomeId);
    return score === undefined ? undefined : { representativeId, score };
  }

  private requireRepresentative(genomeId: string): RepresentativeGenome {
    const genome = this.genomes.get(genomeId);
    if (genome === undefined) {
      throw new UnknownRepresentativeError(genomeId);
    }
    return genome;
  }
}
