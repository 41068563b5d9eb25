import { z } from "zod";
import type { AppLogger } from "../logger/index.js";
import { EvaluationFailure, describeError } from "../errors.js";
import { clamp } from "../analysis/textUtils.js";
import { chatJson, type ChatCompletionsClient } from "./client.js";
import { buildCoverageMessages } from "./prompts.js";
import type { CategoryJudgment, CoverageEvaluator, EvaluationRequest } from "./evaluator.js";

const aspectReplySchema = z.object({
  aspect: z.string().trim().min(1),
  covered: z.boolean(),
  confidence: z.coerce.number().finite().optional(),
  excerpt: z.string().default(""),
  sourceRefs: z.array(z.string()).default([]),
  note: z.string().optional(),
});

export const judgmentReplySchema = z.object({
  aspects: z.array(aspectReplySchema),
  summary: z.string().optional(),
  recommendations: z.array(z.string()).default([]),
});

/**
 * Validates a model reply into a `CategoryJudgment`.
 * A missing `confidence` becomes 1 for covered aspects and 0 otherwise.
 */
export function toCategoryJudgment(json: unknown): CategoryJudgment {
  const parsed = judgmentReplySchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new EvaluationFailure(
      "malformed",
      `Evaluator reply does not match the expected shape (${first ? `${first.path.join(".")}: ${first.message}` : "unknown"})`
    );
  }
  if (!parsed.data.aspects.length) {
    throw new EvaluationFailure("empty", "Evaluator reply contains no aspect judgments");
  }

  return {
    aspects: parsed.data.aspects.map((a) => ({
      aspect: a.aspect,
      covered: a.covered,
      confidence: clamp(a.confidence ?? (a.covered ? 1 : 0), 0, 1),
      excerpt: a.excerpt.trim(),
      sourceRefs: a.sourceRefs,
      note: a.note,
    })),
    summary: parsed.data.summary,
    recommendations: parsed.data.recommendations.filter((r) => r.trim()),
  };
}

export type OpenAIEvaluatorParams = {
  logger: AppLogger;
  client: ChatCompletionsClient;
  model: string;
  temperature?: number;
};

/** Production evaluator backed by an OpenAI-compatible chat model. */
export class OpenAICoverageEvaluator implements CoverageEvaluator {
  readonly name = "openai";
  private readonly params: OpenAIEvaluatorParams;

  constructor(params: OpenAIEvaluatorParams) {
    this.params = params;
  }

  async evaluate(request: EvaluationRequest, opts: { signal: AbortSignal }): Promise<CategoryJudgment> {
    let json: unknown;
    try {
      ({ json } = await chatJson({
        logger: this.params.logger,
        client: this.params.client,
        model: this.params.model,
        purpose: `coverage.${request.category.id}`,
        temperature: this.params.temperature ?? 0.2,
        messages: buildCoverageMessages(request),
        signal: opts.signal,
      }));
    } catch (err) {
      if (opts.signal.aborted) throw err;
      const reason = err instanceof SyntaxError ? "malformed" : "error";
      throw new EvaluationFailure(reason, `Evaluation call failed: ${describeError(err).message}`, { cause: err });
    }
    return toCategoryJudgment(json);
  }
}
