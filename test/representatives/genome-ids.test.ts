import { describe, expect, test } from "vitest";
import { genomeIdFromFeature, isGenomeId, normalizeQueryId } from "../../src/representatives/genome-ids";

describe("genome IDs", () => {
  test("isGenomeId", () => {
    expect(isGenomeId("83333.1")).toBe(true);
    expect(isGenomeId("83333")).toBe(false);
    expect(isGenomeId("fig|83333.1.peg.42")).toBe(false);
  });

  test("genomeIdFromFeature", () => {
    expect(genomeIdFromFeature("fig|83333.1.peg.42")).toBe("83333.1");
    expect(genomeIdFromFeature("83333.1.peg.42")).toBe("83333.1");
    expect(genomeIdFromFeature("83333.1")).toBe("83333.1");
    expect(genomeIdFromFeature("seq7")).toBeUndefined();
  });

  test("normalizeQueryId falls back to the ID", () => {
    expect(normalizeQueryId("fig|562.7.peg.3")).toBe("562.7");
    expect(normalizeQueryId("query-1")).toBe("query-1");
  });
});
