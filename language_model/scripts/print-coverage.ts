import { computeKnowledgeBaseCoverage } from "../src/coverage.js";

function formatPercent(numerator: number, denominator: number): string {
  if (denominator === 0) return "0%";
  return ((numerator / denominator) * 100).toFixed(1) + "%";
}

function printCoverage() {
  const coverage = computeKnowledgeBaseCoverage();

  console.log("Language knowledge base coverage\n");
  console.log(`Country defaults: ${coverage.totalCountryDefaults}`);
  console.log(`Admin-1 overrides: ${coverage.totalOverrides} across ${coverage.countriesWithOverrides} countries`);
  console.log(`Languages referenced: ${coverage.languagesReferenced}`);
  console.log(
    `Languages without a BCP-47 code: ${coverage.languagesWithoutCode.length} (${formatPercent(
      coverage.languagesWithoutCode.length,
      coverage.languagesReferenced
    )})`
  );

  console.log("\nOverrides by country:");
  for (const entry of coverage.overrideCoverage) {
    console.log(
      `- ${entry.country} ${entry.label}: ${entry.overrides} overrides, ${entry.distinctLanguages} languages, ${entry.sameAsDefault} same as default`
    );
  }

  if (coverage.misfiledOverrides.length > 0) {
    console.log(`\nMisfiled override codes: ${coverage.misfiledOverrides.join(", ")}`);
  }
  if (coverage.overridesWithoutDefault.length > 0) {
    console.log(`\nOverride countries without a default: ${coverage.overridesWithoutDefault.join(", ")}`);
  }
  if (coverage.languagesWithoutCode.length > 0) {
    console.log(`\nUncoded languages: ${coverage.languagesWithoutCode.join(", ")}`);
  }
}

printCoverage();
