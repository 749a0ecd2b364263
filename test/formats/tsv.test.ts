import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { TsvParser, TsvWriter, type TsvRow } from "../../src/formats/tsv";

async function collect(rows: AsyncIterable<TsvRow>): Promise<TsvRow[]> {
  const result: TsvRow[] = [];
  for await (const row of rows) result.push(row);
  return result;
}

describe("TsvParser", () => {
  test("splits on tabs and records line numbers", async () => {
    const rows = await collect(new TsvParser().parseString("83333.1\tEscherichia coli\n\n562.2\tE. coli 2\n"));

    expect(rows).toEqual([
      { fields: ["83333.1", "Escherichia coli"], lineNumber: 1 },
      { fields: ["562.2", "E. coli 2"], lineNumber: 3 },
    ]);
  });

  test("skips comments and the header", async () => {
    const rows = await collect(
      new TsvParser({ header: true, commentPrefix: "#" }).parseString("#note\nid\tname\ng1\tone\n")
    );
    expect(rows).toEqual([{ fields: ["g1", "one"], lineNumber: 3 }]);
  });

  test("warns about short rows and skips them", async () => {
    const warnings: [string, number | undefined][] = [];
    const parser = new TsvParser({
      minColumns: 3,
      onWarning: (warning, lineNumber) => warnings.push([warning, lineNumber]),
    });

    const rows = await collect(parser.parseString("a\tb\tc\nd\te\n"));

    expect(rows).toEqual([{ fields: ["a", "b", "c"], lineNumber: 1 }]);
    expect(warnings).toEqual([["Expected at least 3 columns, found 2", 2]]);
  });

  test("parses chunked input", async () => {
    async function* source(): AsyncIterable<string> {
      yield "g1\t";
      yield "10\ng2\t20";
    }
    const rows = await collect(new TsvParser().parse(source()));
    expect(rows.map((row) => row.fields)).toEqual([
      ["g1", "10"],
      ["g2", "20"],
    ]);
  });

  test("rejects invalid options", () => {
    expect(() => new TsvParser({ minColumns: 0 })).toThrow(ValidationError);
  });
});

describe("TsvWriter", () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = mkdtempSync(join(tmpdir(), "tsv-test-"));
  });

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test("writes the header first and terminates every row", () => {
    const writer = new TsvWriter(["id", "score"]);
    expect(
      writer.formatRows([
        ["g1", 5],
        ["g 2\twith tab", null],
      ])
    ).toBe("id\tscore\ng1\t5\ng 2 with tab\t\n");
  });

  test("writes nothing for no rows and no header", () => {
    expect(new TsvWriter().formatRows([])).toBe("");
  });

  test("replaces embedded newlines", () => {
    expect(new TsvWriter().formatRow(["a\r\nb", true, undefined])).toBe("a b\ttrue\t");
  });

  test("writes files", async () => {
    const path = join(tempDir, "nested", "table.tbl");
    await new TsvWriter().writeFile(path, [["g1", "r1", 150]]);
    expect(readFileSync(path, "utf8")).toBe("g1\tr1\t150\n");
  });
});
