import pLimit from "p-limit";
import { countByOrigin, unitRef } from "../corpus/corpus.js";
import { ORIGIN_KINDS, type Corpus, type DocumentUnit } from "../corpus/types.js";
import { EvaluationFailure, ExtractionGap, RunCancelled, describeError } from "../errors.js";
import type { CoverageEvaluator, EvaluationRequest } from "../llm/evaluator.js";
import type { AppLogger } from "../logger/index.js";
import type {
  CategoryFailure,
  CoverageAssessment,
  CoverageReport,
  ReportCaveat,
  SourceComparisonNote,
} from "../report/schema.js";
import { budgetFor } from "../taxonomy/loader.js";
import type { CategoryDefinition, Taxonomy } from "../taxonomy/schema.js";
import {
  interpretJudgment,
  noEvidenceGaps,
  sourceBreakdown,
  toUnitReference,
  type InterpretedJudgment,
} from "./coverage.js";
import { runWithRetry, type RetryPolicy } from "./retry.js";
import { scoreCorpusUnits } from "./scorer.js";
import { selectUnits } from "./selector.js";
import { CategoryStateTracker, isTerminal } from "./stateTracker.js";
import { mean, roundTo } from "./textUtils.js";

export const REPORT_LIMITATIONS = [
  "Relevance scores come from keyword matching; content phrased without the configured terms can be missed.",
  "Coverage judgments are made by the evaluator over the selected excerpts only, not over the whole site.",
  "Coverage describes what the scraped pages and documents say, not the quality of the program.",
];

export type AnalyzerOptions = {
  evaluator: CoverageEvaluator;
  logger: AppLogger;
  /** Category tasks evaluated at once. */
  concurrency?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  backoffBaseMs?: number;
  /** Aborting stops new category tasks and cancels in-flight evaluation calls. */
  signal?: AbortSignal;
  now?: () => Date;
};

type RunContext = {
  corpus: Corpus;
  taxonomy: Taxonomy;
  evaluator: CoverageEvaluator;
  logger: AppLogger;
  policy: RetryPolicy;
  signal: AbortSignal;
};

/**
 * Scores, selects and evaluates every category of the taxonomy against the
 * corpus and composes the coverage report.
 *
 * Flow:
 * - extraction caveats are computed and logged first;
 * - categories run as independent tasks through a pool of `concurrency` (default 3);
 * - each task scores, selects, then evaluates with per-call timeout and retry,
 *   and ends ASSESSED or FAILED;
 * - the report is composed after every task has settled, in taxonomy order.
 *
 * Options:
 * - `maxAttempts` 3, `backoffBaseMs` 1000 and `timeoutMs` 60000 by default;
 * - `signal`: tasks not yet started end FAILED with kind `Cancelled`, in-flight
 *   calls are aborted and the report has `cancelled: true`;
 * - `now` stamps `generatedAt`.
 *
 * Never rejects because a category failed.
 */
export async function validateCoverage(
  corpus: Corpus,
  taxonomy: Taxonomy,
  opts: AnalyzerOptions
): Promise<CoverageReport> {
  const log = opts.logger;
  const ctx: RunContext = {
    corpus,
    taxonomy,
    evaluator: opts.evaluator,
    logger: log,
    policy: {
      maxAttempts: Math.max(1, opts.maxAttempts ?? 3),
      backoffBaseMs: Math.max(0, opts.backoffBaseMs ?? 1000),
      timeoutMs: Math.max(1, opts.timeoutMs ?? 60_000),
    },
    signal: opts.signal ?? new AbortController().signal,
  };

  const caveats = extractionCaveats(corpus);
  for (const c of caveats) log.warn("Extraction gap", { origin: c.origin });

  log.info("Coverage validation started", {
    institution: corpus.institution,
    units: corpus.units.length,
    categories: taxonomy.categories.length,
    evaluator: opts.evaluator.name,
  });

  const limit = pLimit(Math.max(1, opts.concurrency ?? 3));
  const assessments = await Promise.all(
    taxonomy.categories.map((category) => limit(() => assessCategory(ctx, category)))
  );

  const report = composeReport({
    institution: corpus.institution,
    generatedAt: (opts.now ?? (() => new Date()))().toISOString(),
    assessments,
    caveats,
    cancelled: ctx.signal.aborted,
    taxonomy,
  });

  log.info("Coverage validation complete", {
    averageCoverage: report.summary.averageCoverage,
    failed: report.summary.failedCount,
    cancelled: report.cancelled,
  });
  return report;
}

async function assessCategory(ctx: RunContext, category: CategoryDefinition): Promise<CoverageAssessment> {
  const tracker = new CategoryStateTracker();
  const log = ctx.logger.child({ categoryId: category.id });
  const settings = ctx.taxonomy.settings;
  let selected: DocumentUnit[] = [];
  let attempts = 0;

  const fail = (failure: CategoryFailure): CoverageAssessment => {
    if (!isTerminal(tracker.state)) tracker.advance("FAILED");
    return buildAssessment(category, tracker.trace, selected, attempts, {
      status: "FAILED",
      outcome: "failed",
      failure,
    });
  };

  if (ctx.signal.aborted) {
    log.info("Category skipped: run cancelled");
    return fail({ kind: "Cancelled", message: new RunCancelled().message });
  }

  try {
    const scored = scoreCorpusUnits(ctx.corpus.units, category, settings.scoring);
    tracker.advance("SCORED");

    const budget = budgetFor(category, settings);
    const selection = selectUnits(scored, budget);
    selected = selection.selected.map((s) => s.unit);
    tracker.advance("SELECTED");
    log.debug("Units selected", {
      candidates: selection.candidates,
      selected: selected.length,
      skippedOversize: selection.skippedOversize,
      totalChars: selection.totalChars,
      budget,
    });

    if (!selected.length) {
      tracker.advance("ASSESSED");
      log.info("No relevant content", { candidates: selection.candidates });
      return buildAssessment(category, tracker.trace, selected, attempts, {
        status: "ASSESSED",
        outcome: "no_relevant_content",
        gaps: noEvidenceGaps(category),
      });
    }

    const request = buildEvaluationRequest(ctx.corpus.institution, category, selected);
    const outcome = await runWithRetry(
      async (signal) => {
        const judgment = await ctx.evaluator.evaluate(request, { signal });
        return interpretJudgment(category, judgment, selected, settings.coverage.aggregation);
      },
      ctx.policy,
      ctx.signal,
      ({ attempt, delayMs, error }) =>
        log.warn("Evaluation attempt failed; retrying", { attempt, delayMs, reason: error.reason, error: error.message })
    );
    attempts = outcome.attempts;

    if (!outcome.ok) {
      if (outcome.error instanceof RunCancelled) {
        log.info("Evaluation cancelled", { attempts });
        return fail({ kind: "Cancelled", message: outcome.error.message });
      }
      log.error("Evaluation failed", { attempts, reason: outcome.error.reason, error: outcome.error.message });
      return fail({ kind: "EvaluationFailure", message: outcome.error.message });
    }

    tracker.advance("EVALUATED");
    tracker.advance("ASSESSED");
    log.info("Category assessed", { coverage: outcome.value.coveragePercent, attempts });
    return buildAssessment(category, tracker.trace, selected, attempts, {
      status: "ASSESSED",
      outcome: "evaluated",
      ...outcome.value,
    });
  } catch (err) {
    log.error("Category task crashed", { error: describeError(err) });
    const message = err instanceof EvaluationFailure ? err.message : `Unexpected error: ${describeError(err).message}`;
    return fail({ kind: "EvaluationFailure", message });
  }
}

function buildEvaluationRequest(
  institution: string,
  category: CategoryDefinition,
  units: readonly DocumentUnit[]
): EvaluationRequest {
  return {
    institution,
    category: {
      id: category.id,
      name: category.name,
      description: category.description,
      subAspects: category.subAspects,
    },
    units: units.map((u) => ({
      ref: unitRef(u),
      origin: u.origin,
      source: u.source,
      heading: u.heading,
      text: u.text,
    })),
  };
}

type AssessmentResult = Pick<CoverageAssessment, "status" | "outcome"> &
  Partial<InterpretedJudgment> & { failure?: CategoryFailure; gaps?: CoverageAssessment["gaps"] };

function buildAssessment(
  category: CategoryDefinition,
  trace: CoverageAssessment["trace"],
  selected: readonly DocumentUnit[],
  attempts: number,
  result: AssessmentResult
): CoverageAssessment {
  return {
    categoryId: category.id,
    categoryName: category.name,
    status: result.status,
    outcome: result.outcome,
    coveragePercent: result.coveragePercent ?? 0,
    strengths: result.strengths ?? [],
    gaps: result.gaps ?? [],
    recommendations: result.recommendations ?? [],
    ...(result.summary ? { summary: result.summary } : {}),
    sourceBreakdown: sourceBreakdown(selected),
    selectedUnits: selected.map(toUnitReference),
    trace,
    attempts,
    ...(result.failure ? { failure: result.failure } : {}),
  };
}

function extractionCaveats(corpus: Corpus): ReportCaveat[] {
  const counts = countByOrigin(corpus);
  return ORIGIN_KINDS.filter((o) => counts[o] === 0).map((origin) => ({
    kind: "ExtractionGap" as const,
    origin,
    message: new ExtractionGap(origin).message,
  }));
}

export function sourceComparisonNotes(
  assessments: readonly CoverageAssessment[],
  dominanceThreshold: number
): SourceComparisonNote[] {
  const notes: SourceComparisonNote[] = [];
  for (const a of assessments) {
    if (a.status === "FAILED") continue;
    const { webChars, pdfChars } = a.sourceBreakdown;
    const total = webChars + pdfChars;
    if (!total) continue;
    const dominantOrigin = pdfChars > webChars ? "pdf" : "web";
    const share = Math.max(webChars, pdfChars) / total;
    if (share < dominanceThreshold) continue;
    const label = dominantOrigin === "pdf" ? "PDF documents" : "web pages";
    notes.push({
      categoryId: a.categoryId,
      dominantOrigin,
      share: roundTo(share, 2),
      note:
        share === 1
          ? `${a.categoryName}: all selected evidence comes from ${label}`
          : `${a.categoryName}: ${Math.round(share * 100)}% of selected evidence comes from ${label}`,
    });
  }
  return notes;
}

export function composeReport(params: {
  institution: string;
  generatedAt: string;
  assessments: CoverageAssessment[];
  caveats: ReportCaveat[];
  cancelled: boolean;
  taxonomy: Taxonomy;
}): CoverageReport {
  const { assessments, taxonomy } = params;
  const nonFailed = assessments.filter((a) => a.status !== "FAILED");

  return {
    institution: params.institution,
    generatedAt: params.generatedAt,
    categories: assessments,
    summary: {
      averageCoverage: nonFailed.length ? roundTo(mean(nonFailed.map((a) => a.coveragePercent)), 1) : null,
      categoryCount: assessments.length,
      assessedCount: assessments.filter((a) => a.outcome === "evaluated").length,
      noRelevantContentCount: assessments.filter((a) => a.outcome === "no_relevant_content").length,
      failedCount: assessments.length - nonFailed.length,
    },
    sourceComparison: sourceComparisonNotes(assessments, taxonomy.settings.coverage.dominanceThreshold),
    caveats: params.caveats,
    cancelled: params.cancelled,
    settings: taxonomy.settings,
    limitations: [...REPORT_LIMITATIONS],
  };
}
