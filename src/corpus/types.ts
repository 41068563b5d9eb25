export type OriginKind = "web" | "pdf";

export const ORIGIN_KINDS: readonly OriginKind[] = ["web", "pdf"];

/**
 * One chunk of extracted text.
 *
 * `position` is unique within a corpus; ranking ties and report ordering fall
 * back to it, so two runs over the same corpus order units identically.
 */
export type DocumentUnit = {
  readonly source: string;
  readonly origin: OriginKind;
  readonly heading?: string;
  readonly text: string;
  readonly position: number;
};

export type Corpus = {
  readonly institution: string;
  readonly units: readonly DocumentUnit[];
};
