import type { OriginKind } from "../corpus/types.js";

export type EvaluationUnit = {
  ref: string;
  origin: OriginKind;
  source: string;
  heading?: string;
  text: string;
};

export type EvaluationRequest = {
  institution: string;
  category: {
    id: string;
    name: string;
    description: string;
    subAspects: readonly string[];
  };
  /** Selected units in ranked order. */
  units: EvaluationUnit[];
};

export type AspectJudgment = {
  aspect: string;
  covered: boolean;
  /** 0..1 */
  confidence: number;
  excerpt: string;
  /** Unit references (`U<position>`) the judgment rests on. */
  sourceRefs: string[];
  note?: string;
};

export type CategoryJudgment = {
  aspects: AspectJudgment[];
  summary?: string;
  recommendations: string[];
};

/**
 * The evaluation step: decides which sub-aspects the selected text covers.
 *
 * Implementations throw `EvaluationFailure` for errors, timeouts and
 * unusable output, and must stop work when `signal` aborts.
 */
export interface CoverageEvaluator {
  readonly name: string;
  evaluate(request: EvaluationRequest, opts: { signal: AbortSignal }): Promise<CategoryJudgment>;
}
