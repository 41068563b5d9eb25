export function normalizeText(input: string): string {
  return input.replace(/\r\n/g, "\n").replace(/[ \t]+/g, " ").trim();
}

/**
 * Normalized form used for all term matching.
 *
 * Lowercases, folds compatibility characters (NFKC) and turns every run of
 * non-letter/non-digit characters into a single space, so "Pre-Clinical," and
 * "pre clinical" compare equal.
 */
export function normalizeForMatch(input: string): string {
  return input
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/**
 * Whole-word / whole-phrase containment on already-normalized strings.
 * Both sides are padded with spaces so "aid" does not match inside "said".
 */
export function containsTerm(normalizedText: string, normalizedTerm: string): boolean {
  if (!normalizedTerm || !normalizedText) return false;
  return ` ${normalizedText} `.includes(` ${normalizedTerm} `);
}

export function wordCount(normalizedText: string): number {
  if (!normalizedText) return 0;
  return normalizedText.split(" ").length;
}

export function splitSentences(input: string): string[] {
  const text = normalizeText(input);
  if (!text) return [];
  return text
    .split(/(?<=[.!?])\s+/g)
    .map((s) => s.trim())
    .filter(Boolean);
}

export function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}

export function mean(xs: number[]): number {
  if (!xs.length) return 0;
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}

export function roundTo(n: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

export function excerpt(text: string, maxChars: number): string {
  const t = normalizeText(text).replace(/\s+/g, " ");
  if (t.length <= maxChars) return t;
  return `${t.slice(0, Math.max(0, maxChars - 1)).trimEnd()}…`;
}
