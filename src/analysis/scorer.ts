import type { DocumentUnit } from "../corpus/types.js";
import type { CategoryDefinition, ScoringSettings } from "../taxonomy/schema.js";
import { containsTerm, normalizeForMatch, wordCount } from "./textUtils.js";

export type ScoredUnit = {
  unit: DocumentUnit;
  categoryId: string;
  /** >= 0; 0 means the unit is not a selection candidate. */
  score: number;
  /** Normalized must-include terms found in the unit, sorted. */
  matchedMustInclude: string[];
  /** Normalized vocabulary terms found in the unit, sorted. */
  matchedKeywords: string[];
};

/**
 * Relevance of one unit to one category.
 *
 * score = sum of weights of distinct vocabulary terms present, damped by
 * sqrt(words / lengthReferenceWords) for long units when length normalization
 * is on, then multiplied by `mustIncludePenalty` if the category has
 * must-include terms and the unit matches none of them.
 */
export function scoreUnit(
  unit: DocumentUnit,
  category: CategoryDefinition,
  scoring: ScoringSettings
): ScoredUnit {
  const text = normalizeForMatch(unit.text);
  if (!text) {
    return { unit, categoryId: category.id, score: 0, matchedMustInclude: [], matchedKeywords: [] };
  }

  let raw = 0;
  const matchedKeywords: string[] = [];
  for (const [term, weight] of category.keywords) {
    if (containsTerm(text, term)) {
      raw += weight;
      matchedKeywords.push(term);
    }
  }

  const matchedMustInclude = category.mustInclude.filter((t) => containsTerm(text, t));

  let score = raw;
  if (score > 0 && scoring.normalizeByLength) {
    score /= Math.sqrt(Math.max(1, wordCount(text) / scoring.lengthReferenceWords));
  }
  if (score > 0 && category.mustInclude.length > 0 && matchedMustInclude.length === 0) {
    score *= scoring.mustIncludePenalty;
  }

  return {
    unit,
    categoryId: category.id,
    score,
    matchedMustInclude: [...matchedMustInclude].sort(),
    matchedKeywords: matchedKeywords.sort(),
  };
}

export function scoreCorpusUnits(
  units: readonly DocumentUnit[],
  category: CategoryDefinition,
  scoring: ScoringSettings
): ScoredUnit[] {
  return units.map((u) => scoreUnit(u, category, scoring));
}

/** Score descending, then position ascending. */
export function compareScoredUnits(a: ScoredUnit, b: ScoredUnit): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.unit.position - b.unit.position;
}

export function rankScoredUnits(scored: readonly ScoredUnit[]): ScoredUnit[] {
  return [...scored].sort(compareScoredUnits);
}
