import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const runEnvSchema = z.object({
  COVERAGE_CONCURRENCY: positiveInt(3),
  EVAL_TIMEOUT_MS: positiveInt(60_000),
  EVAL_MAX_ATTEMPTS: positiveInt(3),
  EVAL_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  TAXONOMY_PATH: z.string().trim().optional(),
  REPORT_DIR: z.string().trim().min(1).default("reports"),
});

export type RunConfig = {
  concurrency: number;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  taxonomyPath?: string;
  reportDir: string;
};

/** Run settings from the environment; empty variables fall back to defaults. */
export function loadRunConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RunConfig {
  const pick = (key: keyof z.infer<typeof runEnvSchema>) => env[key]?.trim() || undefined;
  const parsed = runEnvSchema.safeParse({
    COVERAGE_CONCURRENCY: pick("COVERAGE_CONCURRENCY"),
    EVAL_TIMEOUT_MS: pick("EVAL_TIMEOUT_MS"),
    EVAL_MAX_ATTEMPTS: pick("EVAL_MAX_ATTEMPTS"),
    EVAL_BACKOFF_MS: pick("EVAL_BACKOFF_MS"),
    TAXONOMY_PATH: pick("TAXONOMY_PATH"),
    REPORT_DIR: pick("REPORT_DIR"),
  });
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid environment",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  const e = parsed.data;
  return {
    concurrency: e.COVERAGE_CONCURRENCY,
    timeoutMs: e.EVAL_TIMEOUT_MS,
    maxAttempts: e.EVAL_MAX_ATTEMPTS,
    backoffBaseMs: e.EVAL_BACKOFF_MS,
    taxonomyPath: e.TAXONOMY_PATH,
    reportDir: e.REPORT_DIR,
  };
}
