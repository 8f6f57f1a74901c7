import type { AssignmentSource, LanguageName } from "../language_model/src/types.js";
import type { Region, RegionKey } from "../ingestion/src/regions.js";

export type { Region, RegionKey };

export type Tier = 1 | 2 | 3;

export interface Classification {
  key: RegionKey;
  name: string;
  /** Country display name, or the ISO code when the source has none. */
  country: string;
  language: LanguageName | null;
  score: number | null;
  tier: Tier | null;
  source: AssignmentSource;
}

export type DiagnosticCounter =
  | "admin1_override"
  | "country_default"
  | "not_in_benchmark"
  | "zero_score"
  | "no_language";

export type Diagnostics = Record<DiagnosticCounter, number>;

export interface ScoreMapEntry {
  name: string;
  country: string;
  language: LanguageName | null;
  score: number | null;
  tier: Tier | null;
}

export type ScoreMap = Record<RegionKey, ScoreMapEntry>;

export interface ClassificationRun {
  classifications: Classification[];
  diagnostics: Diagnostics;
}

export interface PipelineLogger {
  info(message: string): void;
  warn(message: string): void;
}
