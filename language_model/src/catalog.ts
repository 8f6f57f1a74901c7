import { resolve } from "path";
import { fileURLToPath } from "url";
import { readValidatedJson } from "./json.js";
import {
  Admin1OverrideCatalogSchema,
  CountryDefaultCatalogSchema,
  LanguageCodeCatalogSchema,
} from "./schemas.js";
import type {
  Admin1Override,
  Admin1OverrideCatalog,
  Bcp47,
  CountryCode,
  CountryDefaultCatalog,
  LanguageCodeCatalog,
  LanguageName,
  RegionCode,
} from "./types.js";

export const DEFAULT_DATA_DIR = new URL("../data/", import.meta.url);

export const COUNTRY_LANGUAGES_FILE = "country_languages.json";
export const ADMIN1_LANGUAGES_FILE = "admin1_languages.json";
export const LANGUAGE_CODES_FILE = "language_codes.json";

export class KnowledgeBaseError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "KnowledgeBaseError";
    this.path = path;
  }
}

/** Immutable lookup tables built from the knowledge-base data files. */
export interface LanguageCatalog {
  countryDefaults: CountryDefaultCatalog;
  admin1Overrides: Admin1OverrideCatalog;
  languageCodes: LanguageCodeCatalog;
  countryLanguage: ReadonlyMap<CountryCode, LanguageName>;
  admin1Language: ReadonlyMap<RegionCode, Admin1Override>;
  nameToBcp: ReadonlyMap<LanguageName, Bcp47>;
}

export interface CatalogSources {
  countryDefaults: CountryDefaultCatalog;
  admin1Overrides: Admin1OverrideCatalog;
  languageCodes: LanguageCodeCatalog;
}

function indexUnique<T, K>(
  items: T[],
  keyOf: (item: T) => K,
  table: string,
  source: string
): Map<K, T> {
  const idx = new Map<K, T>();
  for (const item of items) {
    const key = keyOf(item);
    if (idx.has(key)) {
      throw new KnowledgeBaseError(source, `Duplicate entry ${String(key)} in ${table}`);
    }
    idx.set(key, item);
  }
  return idx;
}

/**
 * Build the catalog from already-parsed tables. Duplicate keys inside one
 * table are rejected so that file order never decides a language silently.
 */
export function buildLanguageCatalog(sources: CatalogSources, origin = "<memory>"): LanguageCatalog {
  const countryEntries = sources.countryDefaults.regions.flatMap((r) => r.defaults);
  const overrideEntries = sources.admin1Overrides.countries.flatMap((c) => c.overrides);

  const countryLanguage = new Map<CountryCode, LanguageName>();
  indexUnique(countryEntries, (e) => e.country, "country defaults", origin).forEach((e, key) =>
    countryLanguage.set(key, e.language)
  );
  const admin1Language = indexUnique(overrideEntries, (e) => e.code, "admin-1 overrides", origin);
  const nameToBcp = new Map<LanguageName, Bcp47>();
  indexUnique(sources.languageCodes.languages, (e) => e.name, "language codes", origin).forEach((e, key) =>
    nameToBcp.set(key, e.bcp47)
  );

  return {
    countryDefaults: sources.countryDefaults,
    admin1Overrides: sources.admin1Overrides,
    languageCodes: sources.languageCodes,
    countryLanguage,
    admin1Language,
    nameToBcp,
  };
}

function makeError(path: string, message: string, cause?: unknown): Error {
  return new KnowledgeBaseError(path, message, { cause });
}

export function loadLanguageCatalog(dataDir?: string): LanguageCatalog {
  const base = dataDir ? resolve(dataDir) : fileURLToPath(DEFAULT_DATA_DIR);
  const countryPath = resolve(base, COUNTRY_LANGUAGES_FILE);
  const admin1Path = resolve(base, ADMIN1_LANGUAGES_FILE);
  const codesPath = resolve(base, LANGUAGE_CODES_FILE);

  return buildLanguageCatalog(
    {
      countryDefaults: readValidatedJson(countryPath, CountryDefaultCatalogSchema, makeError),
      admin1Overrides: readValidatedJson(admin1Path, Admin1OverrideCatalogSchema, makeError),
      languageCodes: readValidatedJson(codesPath, LanguageCodeCatalogSchema, makeError),
    },
    base
  );
}

let defaultCatalogCache: LanguageCatalog | null = null;

/** The bundled knowledge base, read once per process. */
export function getDefaultLanguageCatalog(): LanguageCatalog {
  if (defaultCatalogCache) return defaultCatalogCache;
  defaultCatalogCache = loadLanguageCatalog();
  return defaultCatalogCache;
}
