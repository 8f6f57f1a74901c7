export * from "./types.js";
export {
  ADMIN1_LANGUAGES_FILE,
  COUNTRY_LANGUAGES_FILE,
  DEFAULT_DATA_DIR,
  KnowledgeBaseError,
  LANGUAGE_CODES_FILE,
  buildLanguageCatalog,
  getDefaultLanguageCatalog,
  loadLanguageCatalog,
  type CatalogSources,
  type LanguageCatalog,
} from "./catalog.js";
export { LanguageKnowledgeBase, admin1OverrideStrategy, countryDefaultStrategy } from "./resolver.js";
export { computeKnowledgeBaseCoverage, type KnowledgeBaseCoverage, type OverrideCoverage } from "./coverage.js";
export { readValidatedJson, type JsonErrorFactory } from "./json.js";
export { Admin1OverrideCatalogSchema, CountryDefaultCatalogSchema, LanguageCodeCatalogSchema } from "./schemas.js";

import { getDefaultLanguageCatalog } from "./catalog.js";
import type { CountryCode, LanguageName, RegionCode } from "./types.js";

export function getCountryLanguage(country: CountryCode): LanguageName | undefined {
  return getDefaultLanguageCatalog().countryLanguage.get(country);
}

export function getAdmin1Language(code: RegionCode): LanguageName | undefined {
  return getDefaultLanguageCatalog().admin1Language.get(code)?.language;
}

export function getOverrideCountries(): CountryCode[] {
  return getDefaultLanguageCatalog().admin1Overrides.countries.map((c) => c.country);
}
