import { getDefaultLanguageCatalog, type LanguageCatalog } from "./catalog.js";
import type {
  LanguageAssignment,
  LanguageName,
  LanguageResolverStrategy,
  RegionLookup,
} from "./types.js";

const UNKNOWN: LanguageAssignment = { source: "unknown", language: null };

export function admin1OverrideStrategy(catalog: LanguageCatalog): LanguageResolverStrategy {
  return {
    source: "admin1_override",
    resolve({ regionKey }) {
      if (!regionKey) return null;
      const override = catalog.admin1Language.get(regionKey);
      return override ? { source: "admin1_override", language: override.language, override } : null;
    },
  };
}

export function countryDefaultStrategy(catalog: LanguageCatalog): LanguageResolverStrategy {
  return {
    source: "country_default",
    resolve({ countryCode }) {
      if (!countryCode) return null;
      const language = catalog.countryLanguage.get(countryCode);
      return language ? { source: "country_default", language } : null;
    },
  };
}

/**
 * Resolves the primary spoken (not official) language of an admin-1
 * region. Strategies are tried in order and the first hit wins, so an
 * admin-1 override always shadows the coarser country default.
 */
export class LanguageKnowledgeBase {
  readonly catalog: LanguageCatalog;
  private readonly strategies: readonly LanguageResolverStrategy[];

  constructor(catalog: LanguageCatalog = getDefaultLanguageCatalog()) {
    this.catalog = catalog;
    this.strategies = [admin1OverrideStrategy(catalog), countryDefaultStrategy(catalog)];
  }

  resolveAssignment(lookup: RegionLookup): LanguageAssignment {
    for (const strategy of this.strategies) {
      const hit = strategy.resolve(lookup);
      if (hit) return hit;
    }
    return UNKNOWN;
  }

  resolve(
    regionKey: string | null | undefined,
    countryCode: string | null | undefined,
    regionName?: string | null
  ): LanguageName | null {
    return this.resolveAssignment({ regionKey, countryCode, regionName }).language;
  }

  bcp47For(language: LanguageName): string | undefined {
    return this.catalog.nameToBcp.get(language);
  }
}
