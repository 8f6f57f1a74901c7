import { resolve } from "path";
import { fileURLToPath } from "url";

export const DEFAULT_INPUT_DIR = new URL("../data/", import.meta.url);

export interface PipelineConfig {
  /** Admin-1 boundaries: a TopoJSON Topology or a GeoJSON FeatureCollection. */
  geometryPath: string;
  /** Benchmark dump: `[{ bcp_47, language_name, average }]`. */
  benchmarkPath: string;
  outputDir: string;
  scoresFileName: string;
  geometryFileName: string;
  /** Also write a decoded GeoJSON copy when the geometry is TopoJSON. */
  geojsonFileName?: string;
  /** TopoJSON object holding the regions; the first object when omitted. */
  objectName?: string;
  /** Directory with the knowledge-base JSON tables; the bundled tables when omitted. */
  knowledgeBaseDir?: string;
}

function dataPath(file: string): string {
  return resolve(fileURLToPath(DEFAULT_INPUT_DIR), file);
}

export const defaultPipelineConfig: PipelineConfig = {
  geometryPath: dataPath("admin1_simplified.topojson"),
  benchmarkPath: dataPath("language_table_live.json"),
  outputDir: fileURLToPath(DEFAULT_INPUT_DIR),
  scoresFileName: "admin1_scores.json",
  geometryFileName: "admin1_with_tiers.topojson",
};

export function resolvePipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const merged: PipelineConfig = { ...defaultPipelineConfig, ...overrides };
  return {
    ...merged,
    geometryPath: resolve(merged.geometryPath),
    benchmarkPath: resolve(merged.benchmarkPath),
    outputDir: resolve(merged.outputDir),
    knowledgeBaseDir: merged.knowledgeBaseDir ? resolve(merged.knowledgeBaseDir) : undefined,
  };
}

export function outputPaths(config: PipelineConfig) {
  return {
    scoresPath: resolve(config.outputDir, config.scoresFileName),
    geometryPath: resolve(config.outputDir, config.geometryFileName),
    geojsonPath: config.geojsonFileName ? resolve(config.outputDir, config.geojsonFileName) : undefined,
  };
}
