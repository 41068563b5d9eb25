import type OpenAI from "openai";
import type { EvaluationRequest, EvaluationUnit } from "./evaluator.js";

/**
 * Selected units joined with a provenance line before each one:
 *
 *   [U3] origin=pdf source=COA.pdf heading="financial/coa"
 *   <unit text>
 */
export function buildProvenanceContent(units: EvaluationUnit[]): string {
  return units
    .map((u) => {
      const heading = u.heading ? ` heading=${JSON.stringify(u.heading)}` : "";
      return `[${u.ref}] origin=${u.origin} source=${u.source}${heading}\n${u.text.trim()}`;
    })
    .join("\n\n");
}

export function buildCoverageMessages(
  request: EvaluationRequest
): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  const { category } = request;

  return [
    {
      role: "system",
      content: [
        "You are an expert in medical education and pre-medical advising.",
        "You review content scraped from a medical school's website and PDF documents and decide, for each key aspect of one information category, whether the content covers it well enough for a pre-med student.",
        "",
        "Rules:",
        "1) Judge only from the supplied content. Do not use outside knowledge about the school.",
        "2) An aspect is covered only if the content gives concrete, usable information about it (not just a link or a heading).",
        "3) Every excerpt must be copied verbatim from the content, at most 200 characters.",
        "4) Cite the bracketed unit references (e.g. U12) that support each judgment.",
        "5) confidence is a number from 0 to 1.",
        "",
        "Output strict JSON only, no prose around it:",
        '{ "aspects": [{ "aspect": "<aspect text exactly as given>", "covered": true|false, "confidence": 0.0-1.0, "excerpt": "...", "sourceRefs": ["U1"], "note": "what is missing or notable" }], "summary": "one or two sentences", "recommendations": ["information a pre-med student would still need"] }',
      ].join("\n"),
    },
    {
      role: "user",
      content: [
        `School: ${request.institution}`,
        `Category: ${category.name}`,
        `Category description: ${category.description}`,
        "Key aspects:",
        ...category.subAspects.map((a) => `- ${a}`),
        "",
        "Content:",
        buildProvenanceContent(request.units),
      ].join("\n"),
    },
  ];
}
