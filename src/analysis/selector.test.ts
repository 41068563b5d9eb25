import { describe, expect, it } from "vitest";
import type { ScoredUnit } from "./scorer.js";
import { selectUnits } from "./selector.js";

const scored = (position: number, score: number, size: number): ScoredUnit => ({
  unit: { source: "doc.pdf", origin: "pdf", text: "x".repeat(size), position },
  categoryId: "research",
  score,
  matchedMustInclude: [],
  matchedKeywords: [],
});

describe("selectUnits", () => {
  it("takes ranked units until the next one would overflow the budget", () => {
    const result = selectUnits(
      [scored(2, 5, 60), scored(1, 5, 30), scored(0, 3, 50), scored(3, 0, 10)],
      100
    );
    expect(result.selected.map((s) => s.unit.position)).toEqual([1, 2]);
    expect(result.totalChars).toBe(90);
    expect(result.candidates).toBe(3);
    expect(result.skippedOversize).toBe(0);
  });

  it("passes over a unit larger than the whole budget", () => {
    const result = selectUnits([scored(0, 9, 150), scored(1, 1, 20)], 100);
    expect(result.selected.map((s) => s.unit.position)).toEqual([1]);
    expect(result.skippedOversize).toBe(1);
  });

  it("selects nothing when no unit scores above zero", () => {
    const result = selectUnits([scored(0, 0, 10), scored(1, 0, 10)], 100);
    expect(result.selected).toEqual([]);
    expect(result.candidates).toBe(0);
    expect(result.totalChars).toBe(0);
  });

  it("keeps within budget and is non-empty whenever a candidate fits", () => {
    let seed = 7;
    const next = (mod: number) => {
      seed = (seed * 48271) % 2147483647;
      return seed % mod;
    };

    for (let round = 0; round < 50; round += 1) {
      const units = Array.from({ length: 12 }, (_, i) => scored(i, next(4), 1 + next(400)));
      const budget = 50 + next(600);
      const result = selectUnits(units, budget);

      const chars = result.selected.reduce((sum, s) => sum + s.unit.text.length, 0);
      expect(chars).toBe(result.totalChars);
      expect(chars).toBeLessThanOrEqual(budget);
      const fits = units.some((s) => s.score > 0 && s.unit.text.length <= budget);
      expect(result.selected.length > 0).toBe(fits);
      expect(selectUnits(units, budget)).toEqual(result);
    }
  });
});
