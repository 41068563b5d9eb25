import { unitSize } from "../corpus/corpus.js";
import { rankScoredUnits, type ScoredUnit } from "./scorer.js";

export type SelectionResult = {
  /** Ranked order: score descending, position ascending. */
  selected: ScoredUnit[];
  /** Units with a positive score. */
  candidates: number;
  /** Positive-score units larger than the whole budget. */
  skippedOversize: number;
  totalChars: number;
};

/**
 * Greedy budget-bounded selection.
 *
 * Units are never split. A unit that alone exceeds the budget can never fit and
 * is passed over; otherwise accumulation stops at the first unit that would
 * push the running total past the budget. Origin kind plays no part here.
 */
export function selectUnits(scored: readonly ScoredUnit[], budgetChars: number): SelectionResult {
  const ranked = rankScoredUnits(scored.filter((s) => s.score > 0));
  const selected: ScoredUnit[] = [];
  let totalChars = 0;
  let skippedOversize = 0;

  for (const s of ranked) {
    const size = unitSize(s.unit);
    if (size > budgetChars) {
      skippedOversize += 1;
      continue;
    }
    if (totalChars + size > budgetChars) break;
    selected.push(s);
    totalChars += size;
  }

  return { selected, candidates: ranked.length, skippedOversize, totalChars };
}
