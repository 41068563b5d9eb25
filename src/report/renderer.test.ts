import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { validateCoverage } from "../analysis/analyzer.js";
import { createCorpus } from "../corpus/corpus.js";
import { EvaluationFailure } from "../errors.js";
import { createAppLogger } from "../logger/index.js";
import { ScriptedEvaluator, firstAspectCovered } from "../testing/scriptedEvaluator.js";
import { defaultTaxonomyPath, loadTaxonomy } from "../taxonomy/loader.js";
import { fileTimestamp, renderTextReport, runLogFileName, slugify, writeReportFiles } from "./renderer.js";

const taxonomy = loadTaxonomy(defaultTaxonomyPath());
const corpus = createCorpus("Example School of Medicine", [
  {
    source: "https://med.example.edu/aid",
    origin: "web",
    text: "Tuition is reviewed every spring, and each entering class may apply for a scholarship.",
    position: 0,
  },
  {
    source: "admissions_guide.pdf",
    origin: "pdf",
    text: "Applicants must submit MCAT scores no older than three years.",
    position: 1,
  },
]);

function run(evaluator = new ScriptedEvaluator()) {
  return validateCoverage(corpus, taxonomy, {
    evaluator,
    logger: createAppLogger({ silent: true }),
    maxAttempts: 1,
    now: () => new Date("2026-01-01T00:00:00.000Z"),
  });
}

describe("renderTextReport", () => {
  it("opens with the executive summary", async () => {
    const lines = renderTextReport(await run()).split("\n");

    expect(lines.slice(0, 8)).toEqual([
      "Content Coverage Analysis Report",
      "School: Example School of Medicine",
      "Generated: 2026-01-01T00:00:00.000Z",
      "",
      "Executive Summary",
      "=================",
      "Average coverage: 4.8%",
      "Categories: 7 (evaluated 2, no relevant content 5, failed 0)",
    ]);
    expect(lines).toContain("- Admissions Process & Requirements: all selected evidence comes from PDF documents");
  });

  it("renders evaluated and empty categories", async () => {
    const text = renderTextReport(await run());

    expect(text).toContain(
      [
        "Financial Information",
        "=====================",
        "Coverage: 16.7%",
        "Evidence: web-only (1 web, 0 pdf units)",
        "",
        "Reviewed 1 units.",
        "",
        "Strengths:",
        "- Tuition and fees [U0]",
      ].join("\n")
    );
    expect(text).toContain(
      ["Coverage: 0.0%", "No matching content found in the scraped pages or PDF documents."].join("\n")
    );
  });

  it("renders failed categories with their reason", async () => {
    const evaluator = new ScriptedEvaluator((request) => {
      if (request.category.id === "financial") throw new EvaluationFailure("error", "upstream returned 503");
      return firstAspectCovered(request);
    });
    const text = renderTextReport(await run(evaluator));

    expect(text).toContain(
      [
        "Financial Information",
        "=====================",
        "Status: FAILED (EvaluationFailure)",
        "Reason: upstream returned 503",
        "Attempts: 1",
      ].join("\n")
    );
  });
});

describe("file naming", () => {
  it("slugifies institution names", () => {
    expect(slugify("Example School of Medicine")).toBe("example_school_of_medicine");
    expect(slugify("!!!")).toBe("institution");
  });

  it("formats UTC timestamps", () => {
    expect(fileTimestamp("2026-01-01T09:05:03.000Z")).toBe("20260101_090503");
  });

  it("names the per-run log file", () => {
    expect(runLogFileName("Example School of Medicine", "2026-01-01T00:00:00.000Z")).toBe(
      "validation_example_school_of_medicine_20260101_000000.log"
    );
  });
});

describe("writeReportFiles", () => {
  it("writes the text and JSON reports side by side", async () => {
    const report = await run();
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "reports-"));

    const { textPath, jsonPath } = writeReportFiles(report, path.join(dir, "out"));

    expect(path.basename(textPath)).toBe("example_school_of_medicine_coverage_report_20260101_000000.txt");
    expect(path.basename(jsonPath)).toBe("example_school_of_medicine_coverage_report_20260101_000000.json");
    expect(fs.readFileSync(textPath, "utf8")).toBe(renderTextReport(report));
    expect(JSON.parse(fs.readFileSync(jsonPath, "utf8"))).toEqual(report);
  });
});
