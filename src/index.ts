/**
 * Admin-1 language coverage
 * -------------------------
 * Assigns every admin-1 region a tier for how well language models serve its
 * primary spoken language, from a curated knowledge base and benchmark scores.
 */
export * from "./types.js";
export { TIER1_CUTOFF, TIER2_CUTOFF, TIERS, TIER_LABELS, NO_DATA_LABEL, tierForScore, tierLabel } from "./tiers.js";
export { classifyRegion, classifyRegions, createDiagnostics } from "./classify.js";
export {
  CLASSIFICATION_PROPERTIES,
  buildScoreMap,
  injectClassifications,
  stableStringify,
  toFeatureCollection,
  writeArtifacts,
  type ArtifactPaths,
  type Artifacts,
} from "./artifacts.js";
export { formatSummary, summarizeRun, type RunSummary, type ScoreDistribution, type TierCount } from "./summary.js";
export {
  DEFAULT_INPUT_DIR,
  defaultPipelineConfig,
  outputPaths,
  resolvePipelineConfig,
  type PipelineConfig,
} from "./config.js";
export { runAdmin1Pipeline, type PipelineOptions, type PipelineResult } from "./pipeline.js";

export { LanguageKnowledgeBase, loadLanguageCatalog, getDefaultLanguageCatalog } from "../language_model/src/index.js";
export { BenchmarkScoreTable, InputFileError, buildRegionStore, loadRegionStore } from "../ingestion/src/api.js";
