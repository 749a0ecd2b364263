/**
 * Tests for the representative-genome similarity index
 */

import { beforeEach, describe, expect, test } from "vitest";
import {
  DuplicateGenomeError,
  SequenceTooShortError,
  UnknownRepresentativeError,
  ValidationError,
} from "../../src/errors";
import { extractKmers, KmerSet } from "../../src/operations/kmer-set";
import { score } from "../../src/operations/similarity";
import { RepresentativeGenomeIndex } from "../../src/representatives/rep-genome-index";

const SEQ_A = "ACDEFGHIKL";
const SEQ_B = "ACDEFGMNPQ";
const SEQ_C = "RSTVWYACDE";

const MARKER =
  "MKTAYIAKQRQISFVKSHFSRQLEERLGLIEVQAPILSRVGDGTQDNLSGAEKAVQVKVKALPDAQFEVVHSLAKWKRQTLGQHDFSAGEGLYTHMKALRPDEDRLSPLHSVYVDQWDWELVMGDGERQFSTLKSTVEAIWAGIKATEAAVSEEFGLAPFLPDQIHFVHSQELLSRYPDLDAKGRERAIAKDLGAVFLVGIGGKLSDGHRHDVRAPDYDDWSTPSELGHAGLNGDILVWNPVLEDAFELSSMGIRVDADTLKHQLALTGDEDRLELEWHQALLRGEMPQTIGGGIGQSRLTMLLLQLPHIGQVQAGVWPAAVRESVPSLL";

function mutate(sequence: string, positions: readonly number[]): string {
  const residues = sequence.split("");
  for (const position of positions) {
    residues[position] = residues[position] === "W" ? "C" : "W";
  }
  return residues.join("");
}

describe("RepresentativeGenomeIndex", () => {
  let index: RepresentativeGenomeIndex;

  beforeEach(() => {
    index = new RepresentativeGenomeIndex({ kmerSize: 3, minScore: 3 });
    index.insert("A", "Genome A", SEQ_A);
    index.insert("B", "Genome B", SEQ_B);
    index.insert("C", "Genome C", SEQ_C);
  });

  describe("construction", () => {
    test("defaults to K=8, score 100, protein", () => {
      const defaults = new RepresentativeGenomeIndex();
      expect(defaults.kmerSize).toBe(8);
      expect(defaults.minScore).toBe(100);
      expect(defaults.alphabet).toBe("protein");
      expect(defaults.scorer.strategy).toEqual({ kind: "shared" });
      expect(defaults.size).toBe(0);
    });

    test("rejects invalid options", () => {
      expect(() => new RepresentativeGenomeIndex({ kmerSize: 0 })).toThrow(ValidationError);
      expect(() => new RepresentativeGenomeIndex({ minScore: -1 })).toThrow(ValidationError);
      expect(() => new RepresentativeGenomeIndex({ minScore: 2.5 })).toThrow(ValidationError);
    });
  });

  describe("insert", () => {
    test("keeps insertion order", () => {
      expect(index.ids()).toEqual(["A", "B", "C"]);
      expect([...index].map((genome) => genome.name)).toEqual(["Genome A", "Genome B", "Genome C"]);
      expect(index.size).toBe(3);
    });

    test("caches the marker k-mers", () => {
      const genome = index.get("A");
      expect(genome?.kmers.size).toBe(8);
      expect(genome?.kmers).toBe(index.get("A")?.kmers);
    });

    test("rejects a duplicate and leaves the first insertion intact", () => {
      expect(() => index.insert("A", "Other", SEQ_C)).toThrow(DuplicateGenomeError);
      expect(index.get("A")?.name).toBe("Genome A");
      expect(index.get("A")?.sequence).toBe(SEQ_A);
      expect(index.size).toBe(3);
    });

    test("rejects markers not longer than K", () => {
      expect(() => index.insert("D", "Short", "ACD")).toThrow(SequenceTooShortError);
      expect(index.isRepresentative("D")).toBe(false);
    });
  });

  describe("insertBatch", () => {
    test("skips records that cannot be inserted", () => {
      const errors: string[] = [];
      const batch = new RepresentativeGenomeIndex({ kmerSize: 3 });

      const result = batch.insertBatch(
        [
          { genomeId: "A", name: "Genome A", sequence: SEQ_A },
          { genomeId: "A", name: "Again", sequence: SEQ_B },
          { genomeId: "X", name: "Short", sequence: "ACD" },
          { genomeId: "C", name: "Genome C", sequence: SEQ_C },
        ],
        { onError: (error) => errors.push(error.name) }
      );

      expect(result).toEqual({ inserted: 2, skipped: 2 });
      expect(errors).toEqual(["DuplicateGenomeError", "SequenceTooShortError"]);
      expect(batch.ids()).toEqual(["A", "C"]);
    });
  });

  describe("bestMatch", () => {
    test("returns the highest-scoring representative", () => {
      expect(index.bestMatch(SEQ_A)).toEqual({ genomeId: "A", score: 8 });
      expect(index.bestMatch(SEQ_B)).toEqual({ genomeId: "B", score: 8 });
      expect(index.bestMatch("MNPQRSTVWY")).toEqual({ genomeId: "C", score: 4 });
    });

    test("breaks ties by insertion order", () => {
      expect(index.bestMatch("ACDEFG")).toEqual({ genomeId: "A", score: 4 });

      const reversed = new RepresentativeGenomeIndex({ kmerSize: 3 });
      reversed.insert("B", "Genome B", SEQ_B);
      reversed.insert("A", "Genome A", SEQ_A);
      expect(reversed.bestMatch("ACDEFG")).toEqual({ genomeId: "B", score: 4 });
    });

    test("is repeatable", () => {
      const first = index.bestMatch("ACDEFG");
      for (let i = 0; i < 5; i++) {
        expect(index.bestMatch("ACDEFG")).toEqual(first);
      }
    });

    test("is undefined when no representative shares a k-mer", () => {
      expect(index.bestMatch("WWWWWW")).toBeUndefined();
    });

    test("is undefined for an empty query k-mer set or an empty index", () => {
      expect(index.bestMatch("ACD")).toBeUndefined();
      expect(new RepresentativeGenomeIndex({ kmerSize: 3 }).bestMatch(SEQ_A)).toBeUndefined();
    });

    test("accepts a precomputed k-mer set", () => {
      expect(index.bestMatch(KmerSet.fromSequence(SEQ_B, 3))).toEqual({ genomeId: "B", score: 8 });
    });

    test("rejects k-mer sets built with another K", () => {
      expect(() => index.bestMatch(KmerSet.fromSequence(SEQ_B, 4))).toThrow(ValidationError);
    });
  });

  describe("matchesAbove and countAbove", () => {
    test("include representatives scoring exactly the threshold", () => {
      expect(index.matchesAbove("ACDEFG", 4)).toEqual(
        new Map([
          ["A", 4],
          ["B", 4],
        ])
      );
      expect(index.countAbove("ACDEFG", 4)).toBe(2);
    });

    test("default to the index threshold", () => {
      expect([...index.matchesAbove("MNPQRSTVWY").keys()]).toEqual(["C"]);
      expect(index.countAbove("MNPQRSTVWY")).toBe(1);
    });

    test("return nothing one above the best score", () => {
      expect(index.matchesAbove("ACDEFG", 5).size).toBe(0);
      expect(index.countAbove("ACDEFG", 5)).toBe(0);
    });

    test("count never rises with the threshold", () => {
      let previous = Number.POSITIVE_INFINITY;
      for (let threshold = 0; threshold <= 9; threshold++) {
        const count = index.countAbove(SEQ_A, threshold);
        expect(count).toBeLessThanOrEqual(previous);
        expect(count).toBe(index.matchesAbove(SEQ_A, threshold).size);
        previous = count;
      }
    });
  });

  describe("bestMatches", () => {
    test("sorts by descending score", () => {
      expect(index.bestMatches(SEQ_A, 2)).toEqual([
        { genomeId: "A", score: 8 },
        { genomeId: "B", score: 4 },
      ]);
    });

    test("applies the minimum score", () => {
      expect(index.bestMatches(SEQ_A, 5, 3)).toEqual([
        { genomeId: "A", score: 8 },
        { genomeId: "B", score: 4 },
      ]);
      expect(index.bestMatches(SEQ_A, 0)).toEqual([]);
    });
  });

  describe("scoreAgainst", () => {
    test("scores one representative", () => {
      expect(index.scoreAgainst(SEQ_A, "C")).toBe(2);
    });

    test("rejects unknown representatives", () => {
      expect(() => index.scoreAgainst(SEQ_A, "Z")).toThrow(UnknownRepresentativeError);
    });
  });

  describe("connections", () => {
    test("records represented genomes in connection order", () => {
      index.connect("A", "562.1", 8);
      index.connect("A", "562.2", 5);

      expect(index.representedList("A")).toEqual([
        { genomeId: "562.1", score: 8 },
        { genomeId: "562.2", score: 5 },
      ]);
      expect(index.checkRepresented("562.2")).toEqual({ representativeId: "A", score: 5 });
      expect(index.checkRepresented("562.3")).toBeUndefined();
    });

    test("moves a genome to its new representative", () => {
      index.connect("A", "562.1", 8);
      index.connect("B", "562.1", 5);

      expect(index.representedList("A")).toEqual([]);
      expect(index.representedList("B")).toEqual([{ genomeId: "562.1", score: 5 }]);
      expect(index.checkRepresented("562.1")).toEqual({ representativeId: "B", score: 5 });
    });

    test("fails for an unknown representative without touching the index", () => {
      expect(() => index.connect("Z", "562.1", 8)).toThrow(UnknownRepresentativeError);
      expect(index.checkRepresented("562.1")).toBeUndefined();
      expect(() => index.representedList("Z")).toThrow(UnknownRepresentativeError);
    });

    test("clearConnections keeps the representatives", () => {
      index.connect("A", "562.1", 8);
      index.clearConnections();

      expect(index.representedList("A")).toEqual([]);
      expect(index.checkRepresented("562.1")).toBeUndefined();
      expect(index.size).toBe(3);
    });
  });

  describe("with K=8 on a full-length marker", () => {
    const mutated = mutate(MARKER, [10, 30, 50]);
    const query = MARKER.slice(0, 80);

    test("scores equal the direct set intersection", () => {
      const markers = new RepresentativeGenomeIndex({ kmerSize: 8, minScore: 100 });
      markers.insert("A", "Genome A", MARKER);
      markers.insert("B", "Genome B", mutated);

      const queryKmers = extractKmers(query, 8);
      const sharedA = score(queryKmers, extractKmers(MARKER, 8));
      const sharedB = score(queryKmers, extractKmers(mutated, 8));

      expect(sharedA).toBe(queryKmers.size);
      expect(sharedB).toBeLessThan(sharedA);
      expect(markers.bestMatch(query)).toEqual({ genomeId: "A", score: sharedA });
      expect(markers.scoreAgainst(query, "B")).toBe(sharedB);
    });

    test("finds nothing one above the best score", () => {
      const markers = new RepresentativeGenomeIndex({ kmerSize: 8 });
      markers.insert("A", "Genome A", MARKER);
      markers.insert("B", "Genome B", mutated);

      const best = markers.bestMatch(query);
      expect(best).toBeDefined();
      expect(markers.matchesAbove(query, (best?.score ?? 0) + 1).size).toBe(0);
    });
  });
});
