import { readValidatedJson } from "../../language_model/src/json.js";
import { InputFileError, inputFileError } from "./errors.js";
import {
  GeometryCollectionSchema,
  RegionSourceSchema,
  type RegionSource,
} from "./schemas.js";

export type RegionKey = string;

export interface Region {
  key: RegionKey;
  /** Raw ISO 3166-2 code as found in the source; may be empty. */
  code: string;
  name: string;
  countryCode: string;
  countryName: string;
}

export interface RegionStoreOptions {
  /** TopoJSON object holding the regions; defaults to the first object. */
  objectName?: string;
}

export interface RegionGeometryStore {
  source: RegionSource;
  objectName: string | null;
  regions: Region[];
  /** Keys that occurred more than once and were suffixed to stay unique. */
  duplicateKeys: RegionKey[];
}

export const UNKNOWN_REGION_NAME = "Unknown";

function stringProp(properties: Record<string, unknown> | null | undefined, key: string, fallback = ""): string {
  const value = properties?.[key];
  return typeof value === "string" ? value : fallback;
}

export function regionKeyFor(code: string, countryCode: string, name: string): RegionKey {
  return code ? code : `${countryCode}-${name}`;
}

/**
 * Property bags of every region in source order. Bags are created when a
 * geometry has none, so the returned objects can be written to in place.
 */
export function regionPropertyBags(source: RegionSource, objectName: string | null): Record<string, unknown>[] {
  if (source.type === "FeatureCollection") {
    return source.features.map((f) => {
      if (!f.properties) f.properties = {};
      return f.properties;
    });
  }
  return geometryCollectionOf(source, objectName, "<source>").geometries.map((g) => {
    if (!g.properties) g.properties = {};
    return g.properties;
  });
}

function geometryCollectionOf(
  source: Extract<RegionSource, { type: "Topology" }>,
  objectName: string | null,
  origin: string
) {
  const name = objectName ?? Object.keys(source.objects)[0];
  if (name === undefined) {
    throw new InputFileError(origin, `Topology in ${origin} has no objects`);
  }
  const parsed = GeometryCollectionSchema.safeParse(source.objects[name]);
  if (!parsed.success) {
    throw new InputFileError(origin, `Topology object "${name}" in ${origin} is not a GeometryCollection`, {
      cause: parsed.error,
    });
  }
  // Re-attach the validated collection so later writes land in the source tree.
  source.objects[name] = parsed.data;
  return parsed.data;
}

export function resolveObjectName(source: RegionSource, requested?: string): string | null {
  if (source.type === "FeatureCollection") return null;
  return requested ?? Object.keys(source.objects)[0] ?? null;
}

export function buildRegionStore(
  source: RegionSource,
  options: RegionStoreOptions = {},
  origin = "<memory>"
): RegionGeometryStore {
  const objectName = resolveObjectName(source, options.objectName);
  if (source.type === "Topology") {
    if (objectName !== null && !(objectName in source.objects)) {
      throw new InputFileError(origin, `Topology in ${origin} has no object named "${objectName}"`);
    }
    geometryCollectionOf(source, objectName, origin);
  }

  const seen = new Map<RegionKey, number>();
  const duplicateKeys: RegionKey[] = [];
  const regions = regionPropertyBags(source, objectName).map((properties): Region => {
    const code = stringProp(properties, "iso_3166_2");
    const countryCode = stringProp(properties, "iso_a2");
    const name = stringProp(properties, "name", UNKNOWN_REGION_NAME);
    const admin = stringProp(properties, "admin");

    let key = regionKeyFor(code, countryCode, name);
    const occurrences = (seen.get(key) ?? 0) + 1;
    seen.set(key, occurrences);
    if (occurrences > 1) {
      duplicateKeys.push(key);
      key = `${key}#${occurrences}`;
    }

    return {
      key,
      code,
      name,
      countryCode,
      countryName: admin || countryCode,
    };
  });

  return { source, objectName, regions, duplicateKeys };
}

export function readRegionSource(path: string): RegionSource {
  return readValidatedJson(path, RegionSourceSchema, inputFileError);
}

export function loadRegionStore(path: string, options: RegionStoreOptions = {}): RegionGeometryStore {
  return buildRegionStore(readRegionSource(path), options, path);
}
