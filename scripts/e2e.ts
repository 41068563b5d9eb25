import path from "node:path";
import { fileURLToPath } from "node:url";
import { validateCoverage } from "../src/analysis/analyzer.js";
import { loadCorpus } from "../src/corpus/loader.js";
import { KeywordCoverageEvaluator } from "../src/llm/keywordEvaluator.js";
import { createAppLogger } from "../src/logger/index.js";
import { writeReportFiles } from "../src/report/renderer.js";
import { defaultTaxonomyPath, loadTaxonomy } from "../src/taxonomy/loader.js";

/**
 * Local end-to-end run with the keyword evaluator (no model calls).
 *
 * Usage:
 * - `npx tsx scripts/e2e.ts` (bundled sample corpus under fixtures/)
 * - `npx tsx scripts/e2e.ts /path/to/web.json /path/to/pdf.json`
 */
async function main() {
  const root = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
  const webPath = path.resolve(process.cwd(), process.argv[2] ?? path.join(root, "fixtures/web_pages.json"));
  const pdfPath = path.resolve(process.cwd(), process.argv[3] ?? path.join(root, "fixtures/pdf_documents.json"));

  const logger = createAppLogger({ level: "warn" });
  const corpus = loadCorpus({ institution: "Example School of Medicine", webPath, pdfPath, logger });
  const report = await validateCoverage(corpus, loadTaxonomy(defaultTaxonomyPath()), {
    evaluator: new KeywordCoverageEvaluator(),
    logger,
  });

  const outDir = path.resolve(process.cwd(), "out");
  const { textPath, jsonPath } = writeReportFiles(report, outDir);

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        input: { webPath, pdfPath, units: corpus.units.length },
        summary: report.summary,
        categories: report.categories.map((c) => ({
          id: c.categoryId,
          status: c.status,
          coverage: c.coveragePercent,
          evidence: c.sourceBreakdown.evidence,
        })),
        output: { textPath, jsonPath },
      },
      null,
      2
    )
  );
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
