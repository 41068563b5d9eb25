import fs from "node:fs";
import { z } from "zod";
import { CorpusError } from "../errors.js";
import type { AppLogger } from "../logger/index.js";
import { createCorpus } from "./corpus.js";
import { cleanChunks, cleanText } from "./textCleaner.js";
import type { Corpus, DocumentUnit } from "./types.js";

/** Web scraper output: `{ [url]: { title, text_chunks } }`. */
const webPagesSchema = z.record(
  z.object({
    title: z.string().default(""),
    text_chunks: z.array(z.string()).default([]),
  })
);

/** PDF processor merged output: `{ [filename]: { metadata, content: { chunks } } }`. */
const pdfDocumentsSchema = z.record(
  z.object({
    metadata: z
      .object({
        filename: z.string().optional(),
        type: z.string().default("other"),
        subtype: z.string().default("general"),
      })
      .default({}),
    content: z
      .object({
        chunks: z.array(z.object({ text: z.string() })).default([]),
      })
      .default({}),
  })
);

export type WebPages = z.infer<typeof webPagesSchema>;
export type PdfDocuments = z.infer<typeof pdfDocumentsSchema>;

/** A unit before the corpus assigns its position. */
export type UnitDraft = Omit<DocumentUnit, "position">;

export type CorpusSources = {
  institution: string;
  webPath?: string;
  pdfPath?: string;
  /** Run the text cleaner over every chunk. Default true. */
  clean?: boolean;
  logger?: AppLogger;
};

export function webUnitsFromPages(pages: WebPages, clean = true): UnitDraft[] {
  const units: UnitDraft[] = [];
  for (const [url, page] of Object.entries(pages)) {
    const heading = (clean ? cleanText(page.title) : page.title.trim()) || undefined;
    const chunks = clean ? cleanChunks(page.text_chunks) : page.text_chunks.filter((c) => c.trim());
    for (const text of chunks) units.push({ source: url, origin: "web", heading, text });
  }
  return units;
}

/**
 * PDF chunks take `type/subtype` as heading unless the processor could not
 * classify the file. Cleaning keeps chunks that mention navigation phrases.
 */
export function pdfUnitsFromDocuments(docs: PdfDocuments, clean = true): UnitDraft[] {
  const units: UnitDraft[] = [];
  for (const [filename, doc] of Object.entries(docs)) {
    const { type, subtype } = doc.metadata;
    const heading = type === "other" && subtype === "general" ? undefined : `${type}/${subtype}`;
    const raw = doc.content.chunks.map((c) => c.text);
    const chunks = clean ? cleanChunks(raw, { dropBoilerplate: false }) : raw.filter((c) => c.trim());
    for (const text of chunks) {
      units.push({ source: doc.metadata.filename ?? filename, origin: "pdf", heading, text });
    }
  }
  return units;
}

/** Web drafts first, then PDF drafts, numbered from 0 in that order. */
export function assignPositions(drafts: readonly UnitDraft[]): DocumentUnit[] {
  return drafts.map((d, position) => ({ ...d, position }));
}

/**
 * Builds the corpus from the extractors' JSON files. Either file may be
 * missing; the analyzer reports the missing origin as an extraction gap.
 */
export function loadCorpus(sources: CorpusSources): Corpus {
  const clean = sources.clean ?? true;
  const log = sources.logger;

  const web = sources.webPath
    ? webUnitsFromPages(parseFile(webPagesSchema, sources.webPath, "web pages"), clean)
    : [];
  const pdf = sources.pdfPath
    ? pdfUnitsFromDocuments(parseFile(pdfDocumentsSchema, sources.pdfPath, "PDF documents"), clean)
    : [];

  log?.info("Corpus loaded", {
    institution: sources.institution,
    webUnits: web.length,
    pdfUnits: pdf.length,
    cleaned: clean,
  });

  return createCorpus(sources.institution, assignPositions([...web, ...pdf]));
}

function parseFile<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, filePath: string, label: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new CorpusError(`Cannot read ${label} from ${filePath}`, { cause: err });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? ` at ${first.path.join(".") || "(root)"}: ${first.message}` : "";
    throw new CorpusError(`Unexpected ${label} format in ${filePath}${where}`);
  }
  return parsed.data;
}
