import { fileURLToPath } from "url";
import { getDefaultLanguageCatalog, loadLanguageCatalog } from "../language_model/src/catalog.js";
import { LanguageKnowledgeBase } from "../language_model/src/resolver.js";
import { loadBenchmarkTable } from "../ingestion/src/benchmark.js";
import { loadRegionStore } from "../ingestion/src/regions.js";
import {
  buildScoreMap,
  injectClassifications,
  toFeatureCollection,
  writeArtifacts,
  type Artifacts,
} from "./artifacts.js";
import { classifyRegions } from "./classify.js";
import { outputPaths, resolvePipelineConfig, type PipelineConfig } from "./config.js";
import { formatSummary, summarizeRun, type RunSummary } from "./summary.js";
import type { ClassificationRun, PipelineLogger } from "./types.js";

export interface PipelineOptions extends Partial<PipelineConfig> {
  logger?: PipelineLogger;
  /** Classify and summarize without writing any file. */
  dryRun?: boolean;
}

export interface PipelineResult extends ClassificationRun {
  config: PipelineConfig;
  artifacts: Artifacts;
  summary: RunSummary;
  paths: ReturnType<typeof outputPaths>;
}

const consoleLogger: PipelineLogger = {
  // eslint-disable-next-line no-console
  info: (message) => console.info(message),
  // eslint-disable-next-line no-console
  warn: (message) => console.warn(message),
};

/**
 * Single-pass batch run: load the three inputs, classify every region, then
 * write both artifacts. Any unreadable input throws before a file is written.
 */
export function runAdmin1Pipeline(options: PipelineOptions = {}): PipelineResult {
  const { logger = consoleLogger, dryRun = false, ...overrides } = options;
  const config = resolvePipelineConfig(overrides);

  const catalog = config.knowledgeBaseDir ? loadLanguageCatalog(config.knowledgeBaseDir) : getDefaultLanguageCatalog();
  const knowledgeBase = new LanguageKnowledgeBase(catalog);
  logger.info(`Admin-1 language overrides: ${catalog.admin1Language.size}`);
  logger.info(`Country-level defaults: ${catalog.countryLanguage.size}`);

  const scores = loadBenchmarkTable(config.benchmarkPath, catalog.nameToBcp);
  logger.info(`Language scores loaded for ${scores.size} languages`);

  const store = loadRegionStore(config.geometryPath, { objectName: config.objectName });
  logger.info(`Loaded ${store.regions.length} admin-1 regions from ${config.geometryPath}`);
  if (store.duplicateKeys.length > 0) {
    logger.warn(`Duplicate region keys suffixed to stay unique: ${[...new Set(store.duplicateKeys)].join(", ")}`);
  }

  const { classifications, diagnostics } = classifyRegions(store.regions, knowledgeBase, scores);
  const geometry = injectClassifications(store.source, classifications, store.objectName ?? undefined);
  const artifacts: Artifacts = {
    scoreMap: buildScoreMap(classifications),
    geometry,
    featureCollection:
      config.geojsonFileName && geometry.type === "Topology"
        ? toFeatureCollection(geometry, store.objectName ?? undefined)
        : undefined,
  };

  const summary = summarizeRun(classifications, diagnostics);
  formatSummary(summary).forEach((line) => logger.info(line));

  const paths = outputPaths(config);
  if (!dryRun) {
    writeArtifacts(paths, artifacts);
    logger.info(`Saved ${classifications.length} region mappings to ${paths.scoresPath}`);
    logger.info(`Saved ${paths.geometryPath}`);
    if (paths.geojsonPath && artifacts.featureCollection) logger.info(`Saved ${paths.geojsonPath}`);
  }

  return { config, artifacts, summary, paths, classifications, diagnostics };
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  try {
    runAdmin1Pipeline();
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}
