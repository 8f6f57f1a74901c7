import { afterAll, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  BenchmarkScoreTable,
  InputFileError,
  loadBenchmarkTable,
  readBenchmarkRecords,
  roundScore,
  type BenchmarkRecord,
} from "../src/api.js";

const records: BenchmarkRecord[] = [
  { bcp_47: "fr", language_name: "French", average: 0.8 },
  { bcp_47: "zh", language_name: "Chinese", average: 0.71234 },
  { bcp_47: "ha", language_name: "Hausa", average: 0.55 },
  { bcp_47: "xx", language_name: "Unscored", average: null },
  { bcp_47: "wol", language_name: "Wolof", average: 0.3 },
];

const nameToBcp = new Map([
  ["Mandarin", "zh"],
  ["French", "fr"],
  ["Wolof", "wo"],
]);

const workDir = mkdtempSync(join(tmpdir(), "benchmark-"));

function writeDump(name: string, content: string): string {
  const path = join(workDir, name);
  writeFileSync(path, content, "utf-8");
  return path;
}

afterAll(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("roundScore", () => {
  it("rounds to three decimals", () => {
    expect(roundScore(0.12345)).toBe(0.123);
    expect(roundScore(0.6666)).toBe(0.667);
    expect(roundScore(0.5)).toBe(0.5);
  });

  it("does not lift a half-way average over a tier cutoff", () => {
    expect(roundScore(0.6495)).toBe(0.649);
    expect(roundScore(0.4995)).toBe(0.499);
  });
});

describe("BenchmarkScoreTable", () => {
  const table = new BenchmarkScoreTable(records, nameToBcp);

  it("counts only languages with a score", () => {
    expect(table.size).toBe(4);
  });

  it("maps common names through the curated code table", () => {
    expect(table.codeFor("Mandarin")).toBe("zh");
    expect(table.scoreFor("Mandarin")).toBe(0.712);
  });

  it("falls back to a case-insensitive benchmark name match", () => {
    expect(table.scoreFor("hausa")).toBe(0.55);
    expect(table.scoreFor("CHINESE")).toBe(0.712);
  });

  it("uses the benchmark name when the curated code has no score", () => {
    expect(table.codeFor("Wolof")).toBe("wol");
    expect(table.scoreFor("Wolof")).toBe(0.3);
  });

  it("treats a null average as unscored", () => {
    expect(table.scoreFor("Unscored")).toBeNull();
    expect(table.has("Unscored")).toBe(false);
  });

  it("never substitutes another language's score", () => {
    expect(table.scoreFor("Kanuri")).toBeNull();
    expect(table.has("Kanuri")).toBe(false);
    expect(table.has("French")).toBe(true);
  });

  it("rounds half-way averages from their stored value", () => {
    const edges = new BenchmarkScoreTable(
      [
        { bcp_47: "aa", language_name: "Alpha", average: 0.6495 },
        { bcp_47: "bb", language_name: "Beta", average: 0.4995 },
      ],
      new Map()
    );
    expect(edges.scoreFor("Alpha")).toBe(0.649);
    expect(edges.scoreFor("Beta")).toBe(0.499);
  });

  it("keeps the last score when a code repeats", () => {
    const repeated = new BenchmarkScoreTable(
      [...records, { bcp_47: "fr", language_name: "French", average: 0.9 }],
      nameToBcp
    );
    expect(repeated.scoreFor("French")).toBe(0.9);
  });
});

describe("readBenchmarkRecords", () => {
  it("reads a dump, keeping extra fields and defaulting a missing average to null", () => {
    const path = writeDump(
      "ok.json",
      JSON.stringify([
        { bcp_47: "fr", language_name: "French", average: 0.8, in_benchmark: true },
        { bcp_47: "xx", language_name: "Unscored" },
      ])
    );
    expect(readBenchmarkRecords(path)).toEqual([
      { bcp_47: "fr", language_name: "French", average: 0.8, in_benchmark: true },
      { bcp_47: "xx", language_name: "Unscored", average: null },
    ]);
    expect(loadBenchmarkTable(path, nameToBcp).scoreFor("French")).toBe(0.8);
  });

  it("rejects an average outside [0, 1]", () => {
    const path = writeDump("range.json", JSON.stringify([{ bcp_47: "fr", language_name: "French", average: 1.5 }]));
    expect(() => readBenchmarkRecords(path)).toThrow(
      `Unexpected content in ${path}: 0.average: Number must be less than or equal to 1`
    );
  });

  it("rejects a dump that is not a list", () => {
    const path = writeDump("object.json", JSON.stringify({ fr: 0.8 }));
    expect(() => readBenchmarkRecords(path)).toThrow(InputFileError);
    expect(() => readBenchmarkRecords(path)).toThrow(`Unexpected content in ${path}: (root): Expected array`);
  });

  it("names the path of a missing file", () => {
    const path = join(workDir, "absent.json");
    let caught: unknown;
    try {
      readBenchmarkRecords(path);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InputFileError);
    expect(caught instanceof InputFileError && caught.path).toBe(path);
    expect(caught instanceof Error && caught.message).toBe(`File not found: ${path}`);
  });
});
