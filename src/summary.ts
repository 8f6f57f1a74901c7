import { TIERS } from "./tiers.js";
import type { Classification, DiagnosticCounter, Diagnostics, Tier } from "./types.js";

export interface TierCount {
  tier: Tier;
  count: number;
  percent: number;
}

export interface ScoreDistribution {
  count: number;
  min: number;
  max: number;
  median: number;
}

export interface RunSummary {
  totalRegions: number;
  tiers: TierCount[];
  noTier: number;
  diagnostics: Diagnostics;
  /** Countries whose regions fall into more than one tier, sorted by name. */
  mixedTierCountries: Array<{ country: string; tiers: Tier[] }>;
  /** Distribution over regions with a real, non-zero score. */
  scoreDistribution: ScoreDistribution | null;
}

const DIAGNOSTIC_LABELS: Array<[DiagnosticCounter, string]> = [
  ["admin1_override", "Admin-1 overrides"],
  ["country_default", "Country language"],
  ["not_in_benchmark", "Not in benchmark (-> tier 3)"],
  ["zero_score", "Zero score (-> tier 3)"],
  ["no_language", "No language data (-> no tier)"],
];

function percentOf(count: number, total: number): number {
  return total === 0 ? 0 : (count / total) * 100;
}

function scoreDistribution(classifications: readonly Classification[]): ScoreDistribution | null {
  const scores = classifications
    .map((c) => c.score)
    .filter((s): s is number => s !== null && s > 0)
    .sort((a, b) => a - b);
  if (scores.length === 0) return null;
  return {
    count: scores.length,
    min: scores[0],
    max: scores[scores.length - 1],
    median: scores[Math.floor(scores.length / 2)],
  };
}

export function summarizeRun(classifications: readonly Classification[], diagnostics: Diagnostics): RunSummary {
  const totalRegions = classifications.length;
  const tiers = TIERS.map((tier) => {
    const count = classifications.filter((c) => c.tier === tier).length;
    return { tier, count, percent: percentOf(count, totalRegions) };
  });

  const tiersByCountry = new Map<string, Set<Tier>>();
  for (const c of classifications) {
    if (c.tier === null) continue;
    const set = tiersByCountry.get(c.country) ?? new Set<Tier>();
    set.add(c.tier);
    tiersByCountry.set(c.country, set);
  }
  const mixedTierCountries = [...tiersByCountry.entries()]
    .filter(([, set]) => set.size > 1)
    .map(([country, set]) => ({ country, tiers: [...set].sort((a, b) => a - b) }))
    .sort((a, b) => (a.country < b.country ? -1 : a.country > b.country ? 1 : 0));

  return {
    totalRegions,
    tiers,
    noTier: classifications.filter((c) => c.tier === null).length,
    diagnostics: { ...diagnostics },
    mixedTierCountries,
    scoreDistribution: scoreDistribution(classifications),
  };
}

export function formatSummary(summary: RunSummary): string[] {
  const lines: string[] = [`Classified ${summary.totalRegions} regions`, "", "=== STATS ==="];
  for (const [counter, label] of DIAGNOSTIC_LABELS) {
    lines.push(`  ${`${label}:`.padEnd(32)}${summary.diagnostics[counter]}`);
  }
  for (const { tier, count, percent } of summary.tiers) {
    lines.push(`  Tier ${tier}: ${count} (${percent.toFixed(0)}%)`);
  }
  lines.push(`  No tier: ${summary.noTier}`);

  lines.push("", `Countries with internal tier variation: ${summary.mixedTierCountries.length}`);
  for (const { country, tiers } of summary.mixedTierCountries) {
    lines.push(`  ${country}: tiers ${tiers.join(", ")}`);
  }

  const dist = summary.scoreDistribution;
  if (dist) {
    lines.push(
      "",
      `Score distribution (${dist.count} regions with real scores):`,
      `  Min:    ${dist.min.toFixed(3)}`,
      `  Max:    ${dist.max.toFixed(3)}`,
      `  Median: ${dist.median.toFixed(3)}`
    );
  }
  return lines;
}
