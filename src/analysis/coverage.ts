import { unitRef } from "../corpus/corpus.js";
import type { DocumentUnit } from "../corpus/types.js";
import { EvaluationFailure } from "../errors.js";
import type { AspectJudgment, CategoryJudgment } from "../llm/evaluator.js";
import type {
  CoverageGap,
  EvidenceMix,
  SourceBreakdown,
  StrengthExample,
  UnitReference,
} from "../report/schema.js";
import type { CategoryDefinition, CoverageAggregation } from "../taxonomy/schema.js";
import { clamp, containsTerm, excerpt, normalizeForMatch, roundTo } from "./textUtils.js";

export const NO_MATCHING_CONTENT = "no matching content found";

export function toUnitReference(unit: DocumentUnit): UnitReference {
  return {
    ref: unitRef(unit),
    source: unit.source,
    origin: unit.origin,
    ...(unit.heading ? { heading: unit.heading } : {}),
  };
}

export function sourceBreakdown(units: readonly DocumentUnit[]): SourceBreakdown {
  const b = { webUnits: 0, pdfUnits: 0, webChars: 0, pdfChars: 0 };
  for (const u of units) {
    if (u.origin === "web") {
      b.webUnits += 1;
      b.webChars += u.text.length;
    } else {
      b.pdfUnits += 1;
      b.pdfChars += u.text.length;
    }
  }
  let evidence: EvidenceMix = "none";
  if (b.webUnits && b.pdfUnits) evidence = "both";
  else if (b.webUnits) evidence = "web-only";
  else if (b.pdfUnits) evidence = "pdf-only";
  return { evidence, ...b };
}

/**
 * Pairs each sub-aspect with the judgment the evaluator returned for it.
 * Matching is on normalized text: equal first, then one containing the other
 * among sub-aspects not yet claimed. The first judgment claiming a sub-aspect wins.
 */
export function matchJudgments(
  subAspects: readonly string[],
  judgments: readonly AspectJudgment[]
): Map<string, AspectJudgment> {
  const matched = new Map<string, AspectJudgment>();
  const keys = subAspects.map((a) => ({ aspect: a, key: normalizeForMatch(a) }));

  for (const j of judgments) {
    const jk = normalizeForMatch(j.aspect);
    if (!jk) continue;
    const exact = keys.find((k) => k.key === jk);
    const hit =
      exact ??
      keys.find((k) => !matched.has(k.aspect) && (containsTerm(k.key, jk) || containsTerm(jk, k.key)));
    if (hit && !matched.has(hit.aspect)) matched.set(hit.aspect, j);
  }
  return matched;
}

export type InterpretedJudgment = {
  coveragePercent: number;
  strengths: StrengthExample[];
  gaps: CoverageGap[];
  recommendations: string[];
  summary?: string;
};

/**
 * Turns an evaluator judgment into coverage, strengths and gaps.
 *
 * - `fraction`: covered sub-aspects / all sub-aspects × 100
 * - `confidence`: mean over sub-aspects of (covered ? confidence : 0) × 100
 *
 * Sub-aspects the evaluator skipped count as not covered. A judgment that
 * matches none of the sub-aspects is an `EvaluationFailure`.
 */
export function interpretJudgment(
  category: CategoryDefinition,
  judgment: CategoryJudgment,
  selected: readonly DocumentUnit[],
  aggregation: CoverageAggregation
): InterpretedJudgment {
  if (!judgment.aspects.length) {
    throw new EvaluationFailure("empty", "Evaluator returned no aspect judgments");
  }
  const matched = matchJudgments(category.subAspects, judgment.aspects);
  if (!matched.size) {
    throw new EvaluationFailure("malformed", "Evaluator judgments match none of the category's key aspects");
  }

  const strengths: StrengthExample[] = [];
  const gaps: CoverageGap[] = [];
  let coveredCount = 0;
  let confidenceSum = 0;

  for (const aspect of category.subAspects) {
    const j = matched.get(aspect);
    if (j?.covered) {
      coveredCount += 1;
      confidenceSum += clamp(j.confidence, 0, 1);
      const units = supportingUnits(j, selected);
      const quoted = j.excerpt || (units[0] ? findUnitText(units[0].ref, selected) : "");
      strengths.push({ aspect, excerpt: quoted ? excerpt(quoted, 200) : "", units });
    } else {
      gaps.push({
        aspect,
        reason: j ? j.note?.trim() || "judged not covered by the selected content" : "not assessed by the evaluator",
      });
    }
  }

  const total = category.subAspects.length;
  const ratio = aggregation === "fraction" ? coveredCount / total : confidenceSum / total;

  return {
    coveragePercent: roundTo(ratio * 100, 1),
    strengths,
    gaps,
    recommendations: judgment.recommendations,
    summary: judgment.summary,
  };
}

/**
 * Cited references that were actually selected; failing that, the selected
 * units whose text contains the excerpt.
 */
function supportingUnits(j: AspectJudgment, selected: readonly DocumentUnit[]): UnitReference[] {
  const cited = new Set(j.sourceRefs.map((r) => r.trim().toUpperCase()));
  const byRef = selected.filter((u) => cited.has(unitRef(u)));
  if (byRef.length) return byRef.map(toUnitReference);

  const ex = normalizeForMatch(j.excerpt);
  if (!ex) return [];
  return selected.filter((u) => containsTerm(normalizeForMatch(u.text), ex)).map(toUnitReference);
}

function findUnitText(ref: string, selected: readonly DocumentUnit[]): string {
  return selected.find((u) => unitRef(u) === ref)?.text ?? "";
}

export function noEvidenceGaps(category: CategoryDefinition): CoverageGap[] {
  return category.subAspects.map((aspect) => ({ aspect, reason: NO_MATCHING_CONTENT }));
}
