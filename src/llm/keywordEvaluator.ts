import { containsTerm, excerpt, normalizeForMatch, roundTo, splitSentences } from "../analysis/textUtils.js";
import type { AspectJudgment, CategoryJudgment, CoverageEvaluator, EvaluationRequest } from "./evaluator.js";

const GENERIC_WORDS = new Set([
  "about",
  "and",
  "arrangements",
  "availability",
  "considerations",
  "development",
  "evaluation",
  "for",
  "from",
  "methods",
  "opportunities",
  "other",
  "overview",
  "process",
  "programs",
  "resources",
  "services",
  "special",
  "steps",
  "structure",
  "systems",
  "the",
  "unique",
  "with",
]);

/** Words of a sub-aspect that carry meaning on their own: 4+ chars, not generic. */
export function significantWords(aspect: string): string[] {
  const words = normalizeForMatch(aspect)
    .split(" ")
    .filter((w) => w.length >= 4 && !GENERIC_WORDS.has(w));
  return Array.from(new Set(words));
}

/**
 * Deterministic stand-in for the model: a sub-aspect counts as covered when
 * any selected unit contains one of its significant words. Confidence is the
 * share of significant words found. Runs without network access.
 */
export class KeywordCoverageEvaluator implements CoverageEvaluator {
  readonly name = "keyword";

  async evaluate(request: EvaluationRequest, opts: { signal: AbortSignal }): Promise<CategoryJudgment> {
    opts.signal.throwIfAborted();

    const units = request.units.map((u) => ({ ref: u.ref, text: u.text, normalized: normalizeForMatch(u.text) }));

    const aspects: AspectJudgment[] = request.category.subAspects.map((aspect) => {
      const words = significantWords(aspect);
      const found = words.filter((w) => units.some((u) => containsTerm(u.normalized, w)));
      const supporting = units.filter((u) => found.some((w) => containsTerm(u.normalized, w)));
      const first = supporting[0];
      const sentence = first
        ? splitSentences(first.text).find((s) => found.some((w) => containsTerm(normalizeForMatch(s), w))) ?? first.text
        : "";

      return {
        aspect,
        covered: found.length > 0,
        confidence: words.length ? roundTo(found.length / words.length, 2) : 0,
        excerpt: sentence ? excerpt(sentence, 200) : "",
        sourceRefs: supporting.map((u) => u.ref),
        note: found.length ? undefined : "no selected unit mentions this aspect",
      };
    });

    const covered = aspects.filter((a) => a.covered).length;
    return {
      aspects,
      summary: `${covered} of ${aspects.length} key aspects are mentioned in the selected content.`,
      recommendations: aspects.filter((a) => !a.covered).map((a) => `Add content addressing: ${a.aspect}`),
    };
  }
}
