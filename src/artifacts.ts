import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { feature } from "topojson-client";
import type { Topology } from "topojson-specification";
import type { FeatureCollection } from "geojson";
import { regionPropertyBags, resolveObjectName } from "../ingestion/src/regions.js";
import type { RegionSource, TopologySource } from "../ingestion/src/schemas.js";
import type { Classification, ScoreMap } from "./types.js";

export const CLASSIFICATION_PROPERTIES = ["country", "language", "score", "tier"] as const;

/** Flat `{ key: { name, country, language, score, tier } }` map, keys in region order. */
export function buildScoreMap(classifications: readonly Classification[]): ScoreMap {
  const map: ScoreMap = {};
  for (const c of classifications) {
    map[c.key] = { name: c.name, country: c.country, language: c.language, score: c.score, tier: c.tier };
  }
  return map;
}

/**
 * Return a copy of the geometry source whose region property bags carry the
 * classification. Fields without a value are left out of the bag rather than
 * written as null, so `tier` is either 1, 2, 3 or absent.
 */
export function injectClassifications(
  source: RegionSource,
  classifications: readonly Classification[],
  objectName?: string
): RegionSource {
  const copy = structuredClone(source);
  const bags = regionPropertyBags(copy, resolveObjectName(copy, objectName));
  if (bags.length !== classifications.length) {
    throw new Error(
      `Geometry has ${bags.length} regions but ${classifications.length} classifications were supplied`
    );
  }

  bags.forEach((props, i) => {
    const c = classifications[i];
    for (const field of CLASSIFICATION_PROPERTIES) delete props[field];
    props.country = c.country;
    if (c.language !== null) props.language = c.language;
    if (c.score !== null) props.score = c.score;
    if (c.tier !== null) props.tier = c.tier;
  });
  return copy;
}

function isTopology(source: TopologySource): source is TopologySource & Topology {
  return Array.isArray(source.arcs) && typeof source.objects === "object";
}

/** Decode an (augmented) TopoJSON region collection to plain GeoJSON features. */
export function toFeatureCollection(source: TopologySource, objectName?: string): FeatureCollection {
  const name = resolveObjectName(source, objectName);
  if (name === null || !isTopology(source)) {
    throw new Error("Topology has no objects to decode");
  }
  const object = source.objects[name];
  if (!object || object.type !== "GeometryCollection") {
    throw new Error(`Topology object "${name}" is not a GeometryCollection`);
  }
  return feature(source, object);
}

/** JSON with a trailing newline; key order is insertion order, which follows region order. */
export function stableStringify(value: unknown, indent = 2): string {
  return JSON.stringify(value, null, indent) + "\n";
}

export interface ArtifactPaths {
  scoresPath: string;
  geometryPath: string;
  geojsonPath?: string;
}

export interface Artifacts {
  scoreMap: ScoreMap;
  geometry: RegionSource;
  featureCollection?: FeatureCollection;
}

export function writeArtifacts(paths: ArtifactPaths, artifacts: Artifacts): void {
  mkdirSync(dirname(paths.scoresPath), { recursive: true });
  mkdirSync(dirname(paths.geometryPath), { recursive: true });
  writeFileSync(paths.scoresPath, stableStringify(artifacts.scoreMap), "utf-8");
  writeFileSync(paths.geometryPath, stableStringify(artifacts.geometry, 0), "utf-8");
  if (paths.geojsonPath && artifacts.featureCollection) {
    mkdirSync(dirname(paths.geojsonPath), { recursive: true });
    writeFileSync(paths.geojsonPath, stableStringify(artifacts.featureCollection, 0), "utf-8");
  }
}
