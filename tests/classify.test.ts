import { describe, expect, it } from "vitest";
import { buildLanguageCatalog, LanguageKnowledgeBase } from "../language_model/src/index.js";
import { BenchmarkScoreTable, type Region } from "../ingestion/src/api.js";
import { classifyRegion, classifyRegions, createDiagnostics } from "../src/classify.js";

function region(code: string, countryCode: string, name: string, countryName = countryCode): Region {
  return {
    key: code || `${countryCode}-${name}`,
    code,
    name,
    countryCode,
    countryName,
  };
}

const knowledgeBase = new LanguageKnowledgeBase(
  buildLanguageCatalog({
    countryDefaults: {
      regions: [
        {
          region: "Test",
          defaults: [
            { country: "FR", language: "French" },
            { country: "NG", language: "Hausa" },
            { country: "SN", language: "Wolof" },
          ],
        },
      ],
    },
    admin1Overrides: {
      countries: [
        {
          country: "NG",
          label: "Nigeria",
          overrides: [
            { code: "NG-BO", language: "Kanuri" },
            { code: "NG-LA", language: "Yoruba" },
          ],
        },
      ],
    },
    languageCodes: {
      languages: [
        { name: "French", bcp47: "fr" },
        { name: "Hausa", bcp47: "ha" },
        { name: "Yoruba", bcp47: "yo" },
      ],
    },
  })
);

const scores = new BenchmarkScoreTable(
  [
    { bcp_47: "fr", language_name: "French", average: 0.8 },
    { bcp_47: "ha", language_name: "Hausa", average: 0.55 },
    { bcp_47: "yo", language_name: "Yoruba", average: 0.4321 },
    { bcp_47: "wo", language_name: "Wolof", average: 0 },
  ],
  new Map([["French", "fr"]])
);

describe("classifyRegion", () => {
  it("scores a country-default language", () => {
    const diagnostics = createDiagnostics();
    expect(classifyRegion(region("FR-IDF", "FR", "Ile-de-France", "France"), knowledgeBase, scores, diagnostics)).toEqual({
      key: "FR-IDF",
      name: "Ile-de-France",
      country: "France",
      language: "French",
      score: 0.8,
      tier: 1,
      source: "country_default",
    });
    expect(diagnostics.country_default).toBe(1);
  });

  it("uses the override and rounds its score", () => {
    const result = classifyRegion(region("NG-LA", "NG", "Lagos"), knowledgeBase, scores);
    expect(result.language).toBe("Yoruba");
    expect(result.score).toBe(0.432);
    expect(result.tier).toBe(3);
    expect(result.source).toBe("admin1_override");
  });

  it("puts an unbenchmarked override in tier 3 without borrowing the country score", () => {
    const diagnostics = createDiagnostics();
    const result = classifyRegion(region("NG-BO", "NG", "Borno"), knowledgeBase, scores, diagnostics);
    expect(result).toMatchObject({ language: "Kanuri", score: 0, tier: 3, source: "admin1_override" });
    expect(diagnostics).toEqual({
      admin1_override: 1,
      country_default: 0,
      not_in_benchmark: 1,
      zero_score: 0,
      no_language: 0,
    });
  });

  it("counts a real zero score separately from a missing one", () => {
    const diagnostics = createDiagnostics();
    const result = classifyRegion(region("SN-DK", "SN", "Dakar"), knowledgeBase, scores, diagnostics);
    expect(result).toMatchObject({ language: "Wolof", score: 0, tier: 3 });
    expect(diagnostics.zero_score).toBe(1);
    expect(diagnostics.not_in_benchmark).toBe(0);
  });

  it("leaves regions without any language untiered", () => {
    const diagnostics = createDiagnostics();
    expect(classifyRegion(region("", "XX", "Nowhere", "Atlantis"), knowledgeBase, scores, diagnostics)).toEqual({
      key: "XX-Nowhere",
      name: "Nowhere",
      country: "Atlantis",
      language: null,
      score: null,
      tier: null,
      source: "unknown",
    });
    expect(diagnostics.no_language).toBe(1);
  });

  it("looks up overrides by the raw code, not a suffixed key", () => {
    const duplicate: Region = { ...region("NG-BO", "NG", "Borno"), key: "NG-BO#2" };
    const result = classifyRegion(duplicate, knowledgeBase, scores);
    expect(result.key).toBe("NG-BO#2");
    expect(result.language).toBe("Kanuri");
  });
});

describe("classifyRegions", () => {
  it("yields one classification per region in order", () => {
    const regions = [
      region("NG-KN", "NG", "Kano"),
      region("NG-BO", "NG", "Borno"),
      region("", "XX", "Nowhere"),
      region("", "FR", "Corse"),
    ];
    const run = classifyRegions(regions, knowledgeBase, scores);
    expect(run.classifications.map((c) => [c.key, c.tier])).toEqual([
      ["NG-KN", 2],
      ["NG-BO", 3],
      ["XX-Nowhere", null],
      ["FR-Corse", 1],
    ]);
    expect(run.diagnostics).toEqual({
      admin1_override: 1,
      country_default: 2,
      not_in_benchmark: 1,
      zero_score: 0,
      no_language: 1,
    });
  });

  it("resolves the bundled knowledge base against benchmark scores", () => {
    const bundled = new LanguageKnowledgeBase();
    const table = new BenchmarkScoreTable(
      [
        { bcp_47: "ha", language_name: "Hausa", average: 0.55 },
        { bcp_47: "ta", language_name: "Tamil", average: 0.52 },
      ],
      bundled.catalog.nameToBcp
    );
    const run = classifyRegions(
      [region("NG-BO", "NG", "Borno"), region("IN-TN", "IN", "Tamil Nadu"), region("SN-ZG", "SN", "Ziguinchor")],
      bundled,
      table
    );
    expect(run.classifications.map((c) => [c.language, c.score, c.tier])).toEqual([
      ["Kanuri", 0, 3],
      ["Tamil", 0.52, 2],
      ["Jola", 0, 3],
    ]);
  });
});
