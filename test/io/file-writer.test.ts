/**
 * Tests for file writing with compression support
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, statSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { readToString } from "../../src/io/file-reader";
import { ensureDirectory, writeLines, writeString } from "../../src/io/file-writer";

let outputDir: string;

beforeEach(() => {
  outputDir = mkdtempSync(join(tmpdir(), "file-writer-test-"));
});

afterEach(() => {
  rmSync(outputDir, { recursive: true, force: true });
});

describe("writeString", () => {
  test("creates parent directories", async () => {
    const path = join(outputDir, "a", "b", "K");
    await writeString(path, "8\n100\n");
    expect(readFileSync(path, "utf8")).toBe("8\n100\n");
  });

  test("overwrites existing files", async () => {
    const path = join(outputDir, "out.txt");
    await writeString(path, "first");
    await writeString(path, "second");
    expect(readFileSync(path, "utf8")).toBe("second");
  });

  test("compresses .gz paths", async () => {
    const path = join(outputDir, "markers.fasta.gz");
    await writeString(path, ">g1\nACDE\n");

    const raw = readFileSync(path);
    expect(raw[0]).toBe(0x1f);
    expect(raw[1]).toBe(0x8b);
    expect(gunzipSync(raw).toString("utf8")).toBe(">g1\nACDE\n");
    expect(await readToString(path)).toBe(">g1\nACDE\n");
  });

  test("leaves .gz paths alone when compression is off", async () => {
    const path = join(outputDir, "plain.gz");
    await writeString(path, "text", { autoCompress: false });
    expect(readFileSync(path, "utf8")).toBe("text");
  });

  test("compresses when the format is forced", async () => {
    const path = join(outputDir, "forced.bin");
    await writeString(path, "text", { compressionFormat: "gzip" });
    expect(gunzipSync(readFileSync(path)).toString("utf8")).toBe("text");
  });
});

describe("writeLines", () => {
  test("terminates every line", async () => {
    const path = join(outputDir, "lines.txt");
    await writeLines(path, ["a", "b"]);
    expect(readFileSync(path, "utf8")).toBe("a\nb\n");
  });
});

describe("ensureDirectory", () => {
  test("creates nested directories and tolerates existing ones", async () => {
    const dir = join(outputDir, "x", "y");
    await ensureDirectory(dir);
    await ensureDirectory(dir);
    expect(existsSync(dir)).toBe(true);
    expect(statSync(dir).isDirectory()).toBe(true);
  });
});
