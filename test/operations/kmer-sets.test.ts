import { describe, expect, test } from "vitest";
import {
  kmerContainment,
  kmerDifference,
  kmerIntersection,
  kmerIntersectionSize,
  kmerJaccard,
  kmerUnion,
} from "../../src/operations/core/kmer-sets";

const a = new Set(["ACD", "CDE", "DEF", "EFG"]);
const b = new Set(["DEF", "EFG", "FGH"]);

describe("k-mer set algebra", () => {
  test("intersection", () => {
    expect(kmerIntersection(a, b)).toEqual(new Set(["DEF", "EFG"]));
    expect(kmerIntersectionSize(a, b)).toBe(2);
    expect(kmerIntersectionSize(b, a)).toBe(2);
  });

  test("union", () => {
    expect(kmerUnion(a, b)).toEqual(new Set(["ACD", "CDE", "DEF", "EFG", "FGH"]));
  });

  test("difference is not symmetric", () => {
    expect(kmerDifference(a, b)).toEqual(new Set(["ACD", "CDE"]));
    expect(kmerDifference(b, a)).toEqual(new Set(["FGH"]));
  });

  test("jaccard", () => {
    expect(kmerJaccard(a, b)).toBeCloseTo(2 / 5);
    expect(kmerJaccard(new Set(), new Set())).toBe(1);
    expect(kmerJaccard(a, new Set())).toBe(0);
  });

  test("containment", () => {
    expect(kmerContainment(b, a)).toBeCloseTo(2 / 3);
    expect(kmerContainment(a, b)).toBe(0.5);
    expect(kmerContainment(new Set(), a)).toBe(0);
  });
});
