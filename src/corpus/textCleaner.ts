import { splitSentences } from "../analysis/textUtils.js";

const HTML_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "-",
  mdash: "-",
  rsquo: "'",
  lsquo: "'",
  rdquo: '"',
  ldquo: '"',
};

const BOILERPLATE_PATTERNS = [
  /learn more about/i,
  /click here/i,
  /read more/i,
  /contact us/i,
  /please note/i,
  /you can access/i,
  /for more information/i,
];

export const MIN_CHUNK_CHARS = 20;
export const MAX_CHUNK_CHARS = 800;

export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, body: string) => {
    if (body[0] === "#") {
      const code = body[1] === "x" || body[1] === "X" ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return HTML_ENTITIES[body.toLowerCase()] ?? whole;
  });
}

/**
 * Normalizes scraped text before scoring.
 *
 * Decodes HTML entities, straightens curly quotes, drops e-mail addresses,
 * URLs and stray symbols, puts one space after punctuation and cuts trailing
 * "Learn More About…" / "See All News…" navigation text.
 */
export function cleanText(input: string): string {
  let text = decodeHtmlEntities(input);
  text = text.replace(/\s+/g, " ");
  text = text.replace(/[“”]/g, '"').replace(/[‘’]/g, "'");
  text = text.replace(/[\w.-]+@[\w.-]+\.\w+/g, "");
  text = text.replace(/https?:\/\/\S+/g, "");
  text = text.replace(/[^\p{L}\p{N}\s.,!?;:'"$%/&()-]/gu, " ");
  text = text.replace(/\s+/g, " ");
  text = text.replace(/([.,!?;:])(?!\d)\s*/g, "$1 ");
  text = text.replace(/Learn More About.*$/, "");
  text = text.replace(/See All News.*$/, "");
  return text.trim();
}

export function isBoilerplate(text: string): boolean {
  return BOILERPLATE_PATTERNS.some((re) => re.test(text));
}

/** Splits at sentence boundaries so each piece stays within `maxChars` where possible. */
export function splitLongChunk(text: string, maxChars = MAX_CHUNK_CHARS): string[] {
  if (text.length <= maxChars) return [text];

  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const sentence of splitSentences(text)) {
    if (current.length && currentLength + sentence.length > maxChars) {
      chunks.push(current.join(" "));
      current = [];
      currentLength = 0;
    }
    current.push(sentence);
    currentLength += sentence.length;
  }
  if (current.length) chunks.push(current.join(" "));
  return chunks;
}

function tokenSet(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter(Boolean));
}

/** Share of `candidate`'s distinct tokens that also occur in `existing`. */
export function tokenOverlap(candidate: string, existing: string): number {
  const a = tokenSet(candidate);
  if (!a.size) return 0;
  const b = tokenSet(existing);
  let shared = 0;
  for (const t of a) if (b.has(t)) shared += 1;
  return shared / a.size;
}

export type CleanChunksOptions = {
  minChars?: number;
  maxChars?: number;
  /** Chunks sharing more than this share of tokens with a kept chunk are dropped. */
  duplicateOverlap?: number;
  /** Drop chunks containing navigation phrases ("click here", "please note"). Default true. */
  dropBoilerplate?: boolean;
};

/**
 * Cleans a list of raw chunks: drops short (and, unless disabled, boilerplate)
 * chunks, splits long ones and removes exact and near duplicates, keeping first
 * occurrences.
 */
export function cleanChunks(chunks: readonly string[], opts: CleanChunksOptions = {}): string[] {
  const minChars = opts.minChars ?? MIN_CHUNK_CHARS;
  const maxChars = opts.maxChars ?? MAX_CHUNK_CHARS;
  const duplicateOverlap = opts.duplicateOverlap ?? 0.8;
  const dropBoilerplate = opts.dropBoilerplate ?? true;
  const kept: string[] = [];

  for (const chunk of chunks) {
    if (!chunk || chunk.trim().length < minChars) continue;
    if (dropBoilerplate && isBoilerplate(chunk)) continue;

    const cleaned = cleanText(chunk);
    if (cleaned.length < minChars) continue;
    if (kept.includes(cleaned)) continue;

    for (const piece of splitLongChunk(cleaned, maxChars)) {
      if (kept.some((k) => tokenOverlap(piece, k) > duplicateOverlap)) continue;
      kept.push(piece);
    }
  }
  return kept;
}
