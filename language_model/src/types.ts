export type CountryCode = string;
export type RegionCode = string;
export type LanguageName = string;
export type Bcp47 = string;

export interface CountryDefaultEntry {
  country: CountryCode;
  language: LanguageName;
}

export interface CountryDefaultGroup {
  region: string;
  defaults: CountryDefaultEntry[];
}

export interface CountryDefaultCatalog {
  regions: CountryDefaultGroup[];
}

export interface Admin1Override {
  code: RegionCode;
  language: LanguageName;
  group?: string;
  /** Population-share rationale recorded at curation time. Documentation only. */
  note?: string;
}

export interface Admin1OverrideGroup {
  country: CountryCode;
  label: string;
  note?: string;
  overrides: Admin1Override[];
}

export interface Admin1OverrideCatalog {
  countries: Admin1OverrideGroup[];
}

export interface LanguageCodeEntry {
  name: LanguageName;
  bcp47: Bcp47;
}

export interface LanguageCodeCatalog {
  languages: LanguageCodeEntry[];
}

/** Which resolver strategy produced a language for a region. */
export type AssignmentSource = "admin1_override" | "country_default" | "unknown";

export type LanguageAssignment =
  | { source: "admin1_override"; language: LanguageName; override: Admin1Override }
  | { source: "country_default"; language: LanguageName }
  | { source: "unknown"; language: null };

export interface RegionLookup {
  regionKey: RegionCode | null | undefined;
  countryCode: CountryCode | null | undefined;
  regionName?: string | null;
}

export interface LanguageResolverStrategy {
  source: Exclude<AssignmentSource, "unknown">;
  resolve(lookup: RegionLookup): LanguageAssignment | null;
}
