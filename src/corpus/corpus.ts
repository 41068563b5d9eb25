import { CorpusError } from "../errors.js";
import type { Corpus, DocumentUnit, OriginKind } from "./types.js";

/** Provenance reference used in prompts and reports, e.g. `U12`. */
export function unitRef(unit: Pick<DocumentUnit, "position">): string {
  return `U${unit.position}`;
}

export function unitSize(unit: Pick<DocumentUnit, "text">): number {
  return unit.text.length;
}

/**
 * Freezes units into a corpus sorted by position.
 * Positions must be unique non-negative integers.
 */
export function createCorpus(institution: string, units: readonly DocumentUnit[]): Corpus {
  const seen = new Set<number>();
  for (const u of units) {
    if (!Number.isInteger(u.position) || u.position < 0) {
      throw new CorpusError(`Invalid position ${u.position} for unit from ${u.source}`);
    }
    if (seen.has(u.position)) {
      throw new CorpusError(`Duplicate unit position ${u.position} (${u.source})`);
    }
    seen.add(u.position);
  }

  const sorted = [...units]
    .sort((a, b) => a.position - b.position)
    .map((u) => Object.freeze({ ...u }));

  return Object.freeze({ institution, units: Object.freeze(sorted) });
}

export function countByOrigin(corpus: Corpus): Record<OriginKind, number> {
  const counts: Record<OriginKind, number> = { web: 0, pdf: 0 };
  for (const u of corpus.units) {
    if (u.text.trim()) counts[u.origin] += 1;
  }
  return counts;
}
