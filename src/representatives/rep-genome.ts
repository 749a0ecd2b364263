/**
 * A single representative genome with its cached marker k-mer set
 */

import { KmerSet } from "../operations/kmer-set";
import type { KmerAlphabet, RepresentedEntry } from "../types";

export class RepresentativeGenome {
  /** Computed once at insertion and reused for every query */
  readonly kmers: KmerSet;
  // Insertion-ordered: genome ID -> similarity score
  private readonly represented = new Map<string, number>();

  constructor(
    readonly genomeId: string,
    readonly name: string,
    readonly sequence: string,
    kmerSize: number,
    alphabet: KmerAlphabet
  ) {
    this.kmers = KmerSet.fromSequence(sequence, kmerSize, alphabet);
  }

  get representedCount(): number {
    return this.represented.size;
  }

  representedList(): ReadonlyArray<RepresentedEntry> {
    return Array.from(this.represented, ([genomeId, score]) => ({ genomeId, score }));
  }

  scoreOf(genomeId: string): number | undefined {
    return this.represented.get(genomeId);
  }

  /** @internal Only the owning index maintains representation */
  addRepresented(genomeId: string, score: number): void {
    this.represented.set(genomeId, score);
  }

  /** @internal */
  removeRepresented(genomeId: string): void {
    this.represented.delete(genomeId);
  }
}
