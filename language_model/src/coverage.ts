import { getDefaultLanguageCatalog, type LanguageCatalog } from "./catalog.js";
import type { CountryCode, LanguageName } from "./types.js";

export interface OverrideCoverage {
  country: CountryCode;
  label: string;
  overrides: number;
  distinctLanguages: number;
  /** Overrides that repeat the country default and therefore change nothing. */
  sameAsDefault: number;
}

export interface KnowledgeBaseCoverage {
  totalCountryDefaults: number;
  totalOverrides: number;
  countriesWithOverrides: number;
  languagesReferenced: number;
  /** Referenced languages with no curated BCP-47 code; they can still match a benchmark name. */
  languagesWithoutCode: LanguageName[];
  /** Override codes whose ISO prefix differs from the country group they are filed under. */
  misfiledOverrides: string[];
  /** Override groups for countries that have no country default. */
  overridesWithoutDefault: CountryCode[];
  overrideCoverage: OverrideCoverage[];
}

export function computeKnowledgeBaseCoverage(
  catalog: LanguageCatalog = getDefaultLanguageCatalog()
): KnowledgeBaseCoverage {
  const referenced = new Set<LanguageName>(catalog.countryLanguage.values());
  const misfiledOverrides: string[] = [];
  const overridesWithoutDefault: CountryCode[] = [];

  const overrideCoverage = catalog.admin1Overrides.countries.map((group) => {
    const fallback = catalog.countryLanguage.get(group.country);
    if (fallback === undefined) overridesWithoutDefault.push(group.country);
    const languages = new Set<LanguageName>();
    let sameAsDefault = 0;
    for (const entry of group.overrides) {
      languages.add(entry.language);
      referenced.add(entry.language);
      if (entry.language === fallback) sameAsDefault += 1;
      if (!entry.code.startsWith(`${group.country}-`)) misfiledOverrides.push(entry.code);
    }
    return {
      country: group.country,
      label: group.label,
      overrides: group.overrides.length,
      distinctLanguages: languages.size,
      sameAsDefault,
    };
  });

  const languagesWithoutCode = [...referenced].filter((name) => !catalog.nameToBcp.has(name)).sort();

  return {
    totalCountryDefaults: catalog.countryLanguage.size,
    totalOverrides: catalog.admin1Language.size,
    countriesWithOverrides: overrideCoverage.length,
    languagesReferenced: referenced.size,
    languagesWithoutCode,
    misfiledOverrides,
    overridesWithoutDefault,
    overrideCoverage,
  };
}
