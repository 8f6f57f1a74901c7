import { readValidatedJson } from "../../language_model/src/json.js";
import type { Bcp47, LanguageName } from "../../language_model/src/types.js";
import { inputFileError } from "./errors.js";
import { BenchmarkDumpSchema, type BenchmarkRecord } from "./schemas.js";

const SCORE_DECIMALS = 3;

/** Rounds the stored double's exact value, so 0.6495 (really 0.64949...) stays below 0.65. */
export function roundScore(score: number, decimals = SCORE_DECIMALS): number {
  return Number(score.toFixed(decimals));
}

/**
 * Language-name to benchmark-score lookup.
 *
 * A name is first mapped through the curated common-name table (which knows
 * that "Mandarin" is benchmarked as `zh`), then matched case-insensitively
 * against the benchmark's own language names. A language that is in neither
 * has no score: callers decide what that means, this table never substitutes
 * another language's score.
 */
export class BenchmarkScoreTable {
  readonly records: readonly BenchmarkRecord[];
  private readonly nameToBcp: ReadonlyMap<LanguageName, Bcp47>;
  private readonly bcpToScore = new Map<Bcp47, number>();
  private readonly codesByLowerName = new Map<string, Bcp47[]>();

  constructor(records: readonly BenchmarkRecord[], nameToBcp: ReadonlyMap<LanguageName, Bcp47>) {
    this.records = records;
    this.nameToBcp = nameToBcp;
    for (const record of records) {
      if (record.average !== null) {
        this.bcpToScore.set(record.bcp_47, record.average);
      }
      const lower = record.language_name.toLowerCase();
      const codes = this.codesByLowerName.get(lower) ?? [];
      codes.push(record.bcp_47);
      this.codesByLowerName.set(lower, codes);
    }
  }

  /** Number of languages with a usable score. */
  get size(): number {
    return this.bcpToScore.size;
  }

  /** The benchmark code whose score `scoreFor` would return, if any. */
  codeFor(language: LanguageName): Bcp47 | null {
    const curated = this.nameToBcp.get(language);
    if (curated !== undefined && this.bcpToScore.has(curated)) return curated;

    const candidates = this.codesByLowerName.get(language.toLowerCase()) ?? [];
    return candidates.find((code) => this.bcpToScore.has(code)) ?? null;
  }

  scoreFor(language: LanguageName): number | null {
    const code = this.codeFor(language);
    if (code === null) return null;
    const score = this.bcpToScore.get(code);
    return score === undefined ? null : roundScore(score);
  }

  has(language: LanguageName): boolean {
    return this.codeFor(language) !== null;
  }
}

export function readBenchmarkRecords(path: string): BenchmarkRecord[] {
  return readValidatedJson(path, BenchmarkDumpSchema, inputFileError);
}

export function loadBenchmarkTable(path: string, nameToBcp: ReadonlyMap<LanguageName, Bcp47>): BenchmarkScoreTable {
  return new BenchmarkScoreTable(readBenchmarkRecords(path), nameToBcp);
}
