import type { LanguageKnowledgeBase } from "../language_model/src/resolver.js";
import type { BenchmarkScoreTable } from "../ingestion/src/benchmark.js";
import { tierForScore } from "./tiers.js";
import type { Classification, ClassificationRun, Diagnostics, Region } from "./types.js";

export function createDiagnostics(): Diagnostics {
  return {
    admin1_override: 0,
    country_default: 0,
    not_in_benchmark: 0,
    zero_score: 0,
    no_language: 0,
  };
}

/**
 * Classify one region. Always yields exactly one classification.
 *
 * A language that the benchmark never measured is tier 3 with score 0. It is
 * never re-scored with the country's default language: a region whose
 * plurality language is unbenchmarked is counted as left behind.
 */
export function classifyRegion(
  region: Region,
  knowledgeBase: LanguageKnowledgeBase,
  scores: BenchmarkScoreTable,
  diagnostics: Diagnostics = createDiagnostics()
): Classification {
  const base = { key: region.key, name: region.name, country: region.countryName };
  const assignment = knowledgeBase.resolveAssignment({
    regionKey: region.code,
    countryCode: region.countryCode,
    regionName: region.name,
  });

  if (assignment.source === "unknown") {
    diagnostics.no_language += 1;
    return { ...base, language: null, score: null, tier: null, source: "unknown" };
  }

  diagnostics[assignment.source] += 1;
  const { language, source } = assignment;
  const score = scores.scoreFor(language);

  if (score === null) {
    diagnostics.not_in_benchmark += 1;
    return { ...base, language, score: 0, tier: 3, source };
  }

  if (score === 0) diagnostics.zero_score += 1;
  return { ...base, language, score, tier: tierForScore(score), source };
}

export function classifyRegions(
  regions: readonly Region[],
  knowledgeBase: LanguageKnowledgeBase,
  scores: BenchmarkScoreTable
): ClassificationRun {
  const diagnostics = createDiagnostics();
  const classifications = regions.map((region) => classifyRegion(region, knowledgeBase, scores, diagnostics));
  return { classifications, diagnostics };
}
