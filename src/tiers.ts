import type { Tier } from "./types.js";

/** Benchmark averages at or above this are well served. */
export const TIER1_CUTOFF = 0.65;
/** Partially served from here up to TIER1_CUTOFF; poorly served below. */
export const TIER2_CUTOFF = 0.5;

export const TIERS: readonly Tier[] = [1, 2, 3];

export const TIER_LABELS: Record<Tier, string> = {
  1: "Well served",
  2: "Partially served",
  3: "Poorly served",
};

export const NO_DATA_LABEL = "No data";

export function tierForScore(score: number): Tier {
  if (score >= TIER1_CUTOFF) return 1;
  if (score >= TIER2_CUTOFF) return 2;
  return 3;
}

export function tierLabel(tier: Tier | null): string {
  return tier === null ? NO_DATA_LABEL : TIER_LABELS[tier];
}
