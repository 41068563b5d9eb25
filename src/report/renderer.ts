import fs from "node:fs";
import path from "node:path";
import type { CoverageAssessment, CoverageReport } from "./schema.js";

function underline(title: string, ch: string): string {
  return `${title}\n${ch.repeat(title.length)}`;
}

function formatPercent(n: number | null): string {
  return n === null ? "n/a" : `${n.toFixed(1)}%`;
}

function renderAssessment(a: CoverageAssessment): string[] {
  const lines: string[] = ["", underline(a.categoryName, "=")];

  if (a.status === "FAILED") {
    lines.push(`Status: FAILED (${a.failure?.kind ?? "EvaluationFailure"})`);
    lines.push(`Reason: ${a.failure?.message ?? "unknown"}`);
    if (a.attempts) lines.push(`Attempts: ${a.attempts}`);
    return lines;
  }

  lines.push(`Coverage: ${formatPercent(a.coveragePercent)}`);
  if (a.outcome === "no_relevant_content") {
    lines.push("No matching content found in the scraped pages or PDF documents.");
  } else {
    lines.push(
      `Evidence: ${a.sourceBreakdown.evidence} (${a.sourceBreakdown.webUnits} web, ${a.sourceBreakdown.pdfUnits} pdf units)`
    );
  }
  if (a.summary) lines.push("", a.summary);

  if (a.strengths.length) {
    lines.push("", "Strengths:");
    for (const s of a.strengths) {
      const refs = s.units.length ? ` [${s.units.map((u) => u.ref).join(", ")}]` : "";
      lines.push(`- ${s.aspect}${refs}`);
      if (s.excerpt) lines.push(`    "${s.excerpt}"`);
    }
  }

  if (a.gaps.length) {
    lines.push("", "Gaps:");
    for (const g of a.gaps) lines.push(`- ${g.aspect}: ${g.reason}`);
  }

  if (a.recommendations.length) {
    lines.push("", "Recommendations:");
    for (const r of a.recommendations) lines.push(`- ${r}`);
  }
  return lines;
}

/** Plain-text rendering of a coverage report. */
export function renderTextReport(report: CoverageReport): string {
  const lines: string[] = [
    "Content Coverage Analysis Report",
    `School: ${report.institution}`,
    `Generated: ${report.generatedAt}`,
    "",
    underline("Executive Summary", "="),
    `Average coverage: ${formatPercent(report.summary.averageCoverage)}`,
    `Categories: ${report.summary.categoryCount} (evaluated ${report.summary.assessedCount}, no relevant content ${report.summary.noRelevantContentCount}, failed ${report.summary.failedCount})`,
  ];
  if (report.cancelled) lines.push("Run was cancelled; unfinished categories are marked FAILED.");

  for (const c of report.caveats) lines.push(`Caveat: ${c.message}`);

  if (report.sourceComparison.length) {
    lines.push("", "Source comparison:");
    for (const n of report.sourceComparison) lines.push(`- ${n.note}`);
  }

  for (const a of report.categories) lines.push(...renderAssessment(a));

  lines.push("", "Limitations:");
  for (const l of report.limitations) lines.push(`- ${l}`);

  return `${lines.join("\n")}\n`;
}

export function slugify(name: string): string {
  return (
    name
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "_")
      .replace(/^_+|_+$/g, "") || "institution"
  );
}

/** `yyyymmdd_hhmmss` in UTC. */
export function fileTimestamp(iso: string): string {
  const d = new Date(iso);
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}_` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

/** `validation_<slug>_<timestamp>.log`: the per-run log written beside the reports when enabled. */
export function runLogFileName(institution: string, iso: string): string {
  return `validation_${slugify(institution)}_${fileTimestamp(iso)}.log`;
}

/**
 * Writes `<slug>_coverage_report_<timestamp>.txt` and `.json` into `outDir`
 * (created if missing) and returns both paths.
 */
export function writeReportFiles(report: CoverageReport, outDir: string): { textPath: string; jsonPath: string } {
  fs.mkdirSync(outDir, { recursive: true });
  const base = `${slugify(report.institution)}_coverage_report_${fileTimestamp(report.generatedAt)}`;
  const textPath = path.join(outDir, `${base}.txt`);
  const jsonPath = path.join(outDir, `${base}.json`);
  fs.writeFileSync(textPath, renderTextReport(report), "utf8");
  fs.writeFileSync(jsonPath, `${JSON.stringify(report, null, 2)}\n`, "utf8");
  return { textPath, jsonPath };
}
