#!/usr/bin/env node
import "dotenv/config";
import path from "node:path";
import { validateCoverage } from "./analysis/analyzer.js";
import { USAGE, parseCliArgs } from "./cli/args.js";
import { loadRunConfigFromEnv } from "./config.js";
import { loadCorpus } from "./corpus/loader.js";
import { createOpenAIClient, loadOpenAIConfigFromEnv } from "./llm/client.js";
import type { CoverageEvaluator } from "./llm/evaluator.js";
import { KeywordCoverageEvaluator } from "./llm/keywordEvaluator.js";
import { OpenAICoverageEvaluator } from "./llm/openaiEvaluator.js";
import { createAppLogger, type AppLogger } from "./logger/index.js";
import { runLogFileName, writeReportFiles } from "./report/renderer.js";
import { defaultTaxonomyPath, loadTaxonomy } from "./taxonomy/loader.js";

function createEvaluator(offline: boolean, logger: AppLogger): CoverageEvaluator {
  if (offline) return new KeywordCoverageEvaluator();
  const cfg = loadOpenAIConfigFromEnv();
  return new OpenAICoverageEvaluator({ logger, client: createOpenAIClient(cfg), model: cfg.model });
}

/**
 * CLI entry: wiring only (config → taxonomy → corpus → evaluator → report).
 * Ctrl-C aborts the run; finished categories still reach the written report.
 */
async function main() {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return;
  }
  const args = cli.options;

  const logFile = args.logDir
    ? path.join(args.logDir, runLogFileName(args.institution, new Date().toISOString()))
    : undefined;
  const logger = createAppLogger({ logFile });
  if (logFile) logger.info("Run log", { logFile });
  const env = loadRunConfigFromEnv();

  const taxonomyPath = args.taxonomy ?? env.taxonomyPath ?? defaultTaxonomyPath();
  const taxonomy = loadTaxonomy(taxonomyPath, {
    selection: { defaultBudgetChars: args.budget },
    coverage: { aggregation: args.aggregation },
  });
  logger.info("Taxonomy loaded", { path: taxonomyPath, categories: taxonomy.categories.length });

  const corpus = loadCorpus({
    institution: args.institution,
    webPath: args.web,
    pdfPath: args.pdf,
    clean: !args.raw,
    logger,
  });

  const evaluator = createEvaluator(args.offline, logger);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted; stopping evaluation and writing a partial report");
    controller.abort();
  });

  const report = await validateCoverage(corpus, taxonomy, {
    evaluator,
    logger,
    concurrency: args.concurrency ?? env.concurrency,
    timeoutMs: env.timeoutMs,
    maxAttempts: env.maxAttempts,
    backoffBaseMs: env.backoffBaseMs,
    signal: controller.signal,
  });

  const { textPath, jsonPath } = writeReportFiles(report, args.out ?? env.reportDir);
  logger.info("Report written", { textPath, jsonPath });

  if (report.cancelled) process.exitCode = 130;
}

main().catch((err) => {
  // Fatal setup errors (configuration, unreadable corpus); the run itself never rejects.
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
});
