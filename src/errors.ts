import type { OriginKind } from "./corpus/types.js";

export type CoverageErrorCode =
  | "EXTRACTION_GAP"
  | "EVALUATION_FAILURE"
  | "CONFIGURATION_ERROR"
  | "CORPUS_ERROR"
  | "RUN_CANCELLED";

export class CoverageError extends Error {
  readonly code: CoverageErrorCode;

  constructor(code: CoverageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** One origin kind supplied no usable text; the run continues on the other. */
export class ExtractionGap extends CoverageError {
  readonly origin: OriginKind;

  constructor(origin: OriginKind) {
    super("EXTRACTION_GAP", `No ${origin} content was extracted; coverage relies on the other source only`);
    this.origin = origin;
  }
}

export type EvaluationFailureReason = "error" | "timeout" | "malformed" | "empty";

export class EvaluationFailure extends CoverageError {
  readonly reason: EvaluationFailureReason;

  constructor(reason: EvaluationFailureReason, message: string, options?: { cause?: unknown }) {
    super("EVALUATION_FAILURE", message, options);
    this.reason = reason;
  }
}

export class ConfigurationError extends CoverageError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIGURATION_ERROR", issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

export class CorpusError extends CoverageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CORPUS_ERROR", message, options);
  }
}

export class RunCancelled extends CoverageError {
  constructor(message = "Run was cancelled before this category finished") {
    super("RUN_CANCELLED", message);
  }
}

/** Log- and report-safe view of any thrown value. */
export function describeError(err: unknown): { name: string; message: string } {
  if (err instanceof Error) return { name: err.name, message: err.message };
  return { name: "UnknownError", message: String(err) };
}
