/**
 * End-to-end tests for the repkmer CLI with in-memory I/O
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { CliIO } from "../../src/cli/options";
import { runCli, VERSION } from "../../src/cli/program";
import { saveIndex } from "../../src/representatives/persistence";
import { RepresentativeGenomeIndex } from "../../src/representatives/rep-genome-index";

interface Captured {
  stdout: string;
  stderr: string;
}

function fakeIO(...stdin: string[]): { io: CliIO; out: Captured } {
  const out: Captured = { stdout: "", stderr: "" };
  async function* source(): AsyncIterable<string> {
    for (const chunk of stdin) yield chunk;
  }
  return {
    io: {
      stdin: source(),
      stdout: (text) => {
        out.stdout += text;
      },
      stderr: (text) => {
        out.stderr += text;
      },
    },
    out,
  };
}

const MARKERS = ">83333.1\nACDEFGHIKL\n>562.2\nACDEFGMNPQ\n>1280.4\nRSTVWYACDE\n>999.1\nMNPQRSTVWY\n";
const NAMES = "83333.1\tEscherichia coli\n562.2\tEscherichia fergusonii\n1280.4\tStaphylococcus aureus\n";

let workDir: string;

async function buildRepDir(name: string): Promise<string> {
  const outDir = join(workDir, name);
  const { io } = fakeIO();
  const code = await runCli(
    ["build", join(workDir, "markers.fasta"), join(workDir, "names.tbl"), outDir, "-k", "3", "-s", "3"],
    io
  );
  expect(code).toBe(0);
  return outDir;
}

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "cli-test-"));
  writeFileSync(join(workDir, "markers.fasta"), MARKERS);
  writeFileSync(join(workDir, "names.tbl"), NAMES);
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("global options", () => {
  test("prints the version", async () => {
    const { io, out } = fakeIO();
    expect(await runCli(["--version"], io)).toBe(0);
    expect(out.stdout).toBe(`${VERSION}\n`);
  });

  test("fails on an unknown command", async () => {
    const { io, out } = fakeIO();
    expect(await runCli(["nope"], io)).toBe(1);
    expect(out.stderr).toContain("unknown command 'nope'");
  });
});

describe("build", () => {
  test("writes a representative directory and warns about unnamed genomes", async () => {
    const outDir = join(workDir, "reps");
    const fasta = join(workDir, "markers.fasta");
    const names = join(workDir, "names.tbl");
    const { io, out } = fakeIO();

    const code = await runCli(["build", fasta, names, outDir, "-k", "3", "-s", "3"], io);

    expect(code).toBe(0);
    expect(readFileSync(join(outDir, "K"), "utf8")).toBe("3\n3\n");
    expect(readFileSync(join(outDir, "6.1.1.20.fasta"), "utf8")).toBe(
      ">83333.1\nACDEFGHIKL\n>562.2\nACDEFGMNPQ\n>1280.4\nRSTVWYACDE\n"
    );
    expect(readFileSync(join(outDir, "rep_db.tbl"), "utf8")).toBe("");
    expect(out.stderr).toBe(
      `[WARN] Genome 999.1 has no name in ${names}; skipped.\n` +
        `3 representatives written to ${outDir}, 0 skipped.\n`
    );
  });

  test("skips a marker with an invalid line", async () => {
    const outDir = join(workDir, "reps");
    const fasta = join(workDir, "bad.fasta");
    writeFileSync(fasta, ">83333.1\nACDEFGHIKL\n>562.2\nACDEF1GMNPQ\n");
    const { io, out } = fakeIO();

    const code = await runCli(["build", fasta, join(workDir, "names.tbl"), outDir, "-k", "3", "-s", "3"], io);

    expect(code).toBe(0);
    expect(readFileSync(join(outDir, "6.1.1.20.fasta"), "utf8")).toBe(">83333.1\nACDEFGHIKL\n");
    expect(out.stderr).toBe(
      `[WARN] ${fasta} line 4: Invalid sequence characters in 'ACDEF1GMNPQ'\n` +
        `[WARN] ${fasta} line 3: Sequence '562.2' skipped after an invalid line\n` +
        `1 representatives written to ${outDir}, 0 skipped.\n`
    );
  });

  test("rejects a bad kmer size", async () => {
    const { io } = fakeIO();
    const code = await runCli(
      ["build", join(workDir, "markers.fasta"), join(workDir, "names.tbl"), join(workDir, "x"), "-k", "0"],
      io
    );
    expect(code).toBe(1);
    expect(existsSync(join(workDir, "x"))).toBe(false);
  });
});

describe("query commands", () => {
  let repDir: string;

  beforeEach(async () => {
    repDir = await buildRepDir("reps");
  });

  test("list-reps reads queries from standard input", async () => {
    const { io, out } = fakeIO(">q1\nACDEFG", "HIKL\n>q3\nACD\n");

    expect(await runCli(["list-reps", repDir, "3"], io)).toBe(0);
    expect(out.stdout).toBe(
      "id\trep_id\tgenome_name\tsimilarity\n" +
        "q1\t83333.1\tEscherichia coli\t8\n" +
        "\n" +
        "q3\t<none>\t\t0\n"
    );
    expect(out.stderr).toBe("");
  });

  test("list-reps reads queries from a file", async () => {
    const queries = join(workDir, "queries.fasta");
    writeFileSync(queries, ">q2\nMNPQRSTVWY\n");
    const { io, out } = fakeIO();

    expect(await runCli(["list-reps", repDir, "5", queries], io)).toBe(0);
    expect(out.stdout).toBe("id\trep_id\tgenome_name\tsimilarity\n\nq2\t1280.4\tStaphylococcus aureus\t4\n");
  });

  test("list-reps rejects a non-numeric score", async () => {
    const { io, out } = fakeIO();
    expect(await runCli(["list-reps", repDir, "abc"], io)).toBe(1);
    expect(out.stderr).toBe("[ERROR] Invalid score abc.\n");
  });

  test("count-reps", async () => {
    const { io, out } = fakeIO(">q1\nACDEFGHIKL\n");
    expect(await runCli(["count-reps", repDir, "3"], io)).toBe(0);
    expect(out.stdout).toBe("id\tcount\nq1\t2\n");
  });

  test("distances with the representative matrix", async () => {
    const { io, out } = fakeIO(">fig|562.9.peg.1\nACDEFGHIKL\n");
    expect(await runCli(["distances", repDir, "--matrix"], io)).toBe(0);
    expect(out.stdout).toBe(
      "genome1\tgenome2\tscore\n" +
        "562.9\t83333.1\t8\n" +
        "562.9\t562.2\t4\n" +
        "83333.1\t562.2\t4\n" +
        "83333.1\t1280.4\t2\n" +
        "562.2\t1280.4\t2\n"
    );
  });

  test("closest", async () => {
    const { io, out } = fakeIO(">q1\nACDEFGHIKL\n");
    expect(await runCli(["closest", repDir, "-n", "2"], io)).toBe(0);
    expect(out.stdout).toBe("id\trep_id\tscore\nq1\t83333.1\t8\nq1\t562.2\t4\n");
  });

  test("fails for a directory that is not a representative set", async () => {
    const { io, out } = fakeIO();
    expect(await runCli(["count-reps", join(workDir, "nowhere"), "3"], io)).toBe(1);
    expect(out.stderr).toMatch(/^\[ERROR\] Directory '.*nowhere' is not a representative-genome directory/);
  });
});

describe("analysis commands", () => {
  let repDir: string;

  beforeEach(async () => {
    repDir = await buildRepDir("reps");
  });

  test("matrix", async () => {
    const { io, out } = fakeIO();
    expect(await runCli(["matrix", repDir, "-m", "3"], io)).toBe(0);
    expect(out.stdout).toBe("genome1\tgenome2\tscore\n83333.1\t562.2\t4\n");
  });

  test("neighbors writes repLists.tbl", async () => {
    const { io, out } = fakeIO();
    expect(await runCli(["neighbors", repDir, "-m", "3"], io)).toBe(0);
    expect(readFileSync(join(repDir, "repLists.tbl"), "utf8")).toBe("83333.1\t562.2\n562.2\t83333.1\n1280.4\n");
    expect(out.stderr).toBe("3 representative genomes to process.\n2 neighbors written to repLists.tbl.\n");
  });

  test("quiet suppresses progress messages", async () => {
    const { io, out } = fakeIO();
    expect(await runCli(["-q", "neighbors", repDir], io)).toBe(0);
    expect(out.stderr).toBe("");
  });

  test("vss writes an empty file when no tails are shared", async () => {
    const { io, out } = fakeIO();
    expect(await runCli(["vss", repDir], io)).toBe(0);
    expect(readFileSync(join(repDir, "vss"), "utf8")).toBe("");
    expect(out.stderr).toBe("0 sets written to vss.\n");
  });
});

describe("update and group reports", () => {
  let targetDir: string;
  let sourceDir: string;

  beforeEach(async () => {
    targetDir = await buildRepDir("target");
    sourceDir = join(workDir, "source");
    const source = new RepresentativeGenomeIndex({ kmerSize: 3 });
    source.insert("111.1", "Near", "ACDEFGHIKL");
    source.insert("222.1", "Far", "WWWWWWWW");
    await saveIndex(source, sourceDir);
  });

  test("update connects source genomes to the target", async () => {
    const { io, out } = fakeIO();

    expect(await runCli(["update", sourceDir, targetDir], io)).toBe(0);
    expect(readFileSync(join(targetDir, "rep_db.tbl"), "utf8")).toBe("111.1\t83333.1\t8\n");
    expect(out.stderr).toBe(
      "222.1 (Far) has no representatives.\n" +
        "2 genomes processed: 1 connected, 0 already representatives, " +
        "0 already represented, 1 without a representative.\n"
    );
  });

  test("groups, stats and common-roles read the connections", async () => {
    expect(await runCli(["update", sourceDir, targetDir], fakeIO().io)).toBe(0);

    const groups = fakeIO();
    expect(await runCli(["groups", targetDir, "--sep"], groups.io)).toBe(0);
    expect(groups.out.stdout).toBe(
      "rep_id\trep_name\tgenome_id\tscore\n83333.1\tEscherichia coli\t111.1\t8\n//\n"
    );

    const stats = fakeIO();
    expect(await runCli(["stats", targetDir], stats.io)).toBe(0);
    expect(stats.out.stdout).toBe(
      "name\tsimilarity\tgenomes\tgroups\tsingles\tge100\tlargest\tmean_size\n" +
        `${targetDir}\t3\t4\t3\t2\t0\t2\t1\n`
    );

    const roleTable = join(workDir, "roles.tbl");
    writeFileSync(roleTable, "83333.1\tr1\t1\n111.1\tr1\t1\n111.1\tr2\t1\n");
    const roles = fakeIO();
    expect(
      await runCli(["common-roles", targetDir, roleTable, "--percent", "50", "--size", "2"], roles.io)
    ).toBe(0);
    expect(roles.out.stdout).toBe("83333.1\tEscherichia coli\n\tr1\n\tr2\n");
  });
});
