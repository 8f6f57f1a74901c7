import { z } from "zod";

const countryCode = z.string().regex(/^[A-Z]{2}$/, "Expected an ISO 3166-1 alpha-2 code");
const regionCode = z.string().regex(/^[A-Z]{2}-[A-Z0-9]+$/, "Expected an ISO 3166-2 code");
const languageName = z.string().trim().min(1);

export const CountryDefaultCatalogSchema = z.object({
  regions: z.array(
    z.object({
      region: z.string(),
      defaults: z.array(z.object({ country: countryCode, language: languageName })),
    })
  ),
});

export const Admin1OverrideCatalogSchema = z.object({
  countries: z.array(
    z.object({
      country: countryCode,
      label: z.string(),
      note: z.string().optional(),
      overrides: z.array(
        z.object({
          code: regionCode,
          language: languageName,
          group: z.string().optional(),
          note: z.string().optional(),
        })
      ),
    })
  ),
});

export const LanguageCodeCatalogSchema = z.object({
  languages: z.array(
    z.object({
      name: languageName,
      bcp47: z.string().regex(/^[a-z]{2,3}(-[A-Za-z0-9]+)*$/, "Expected a BCP-47 tag"),
    })
  ),
});
