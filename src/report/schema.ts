import type { OriginKind } from "../corpus/types.js";
import type { TaxonomySettings } from "../taxonomy/schema.js";

export type CategoryState = "PENDING" | "SCORED" | "SELECTED" | "EVALUATED" | "ASSESSED" | "FAILED";

export type TerminalState = Extract<CategoryState, "ASSESSED" | "FAILED">;

export type AssessmentOutcome = "evaluated" | "no_relevant_content" | "failed";

export type EvidenceMix = "web-only" | "pdf-only" | "both" | "none";

export type UnitReference = {
  /** `U<position>` */
  ref: string;
  source: string;
  origin: OriginKind;
  heading?: string;
};

export type StrengthExample = {
  aspect: string;
  excerpt: string;
  units: UnitReference[];
};

export type CoverageGap = {
  aspect: string;
  reason: string;
};

export type SourceBreakdown = {
  evidence: EvidenceMix;
  webUnits: number;
  pdfUnits: number;
  webChars: number;
  pdfChars: number;
};

export type FailureKind = "EvaluationFailure" | "Cancelled";

export type CategoryFailure = {
  kind: FailureKind;
  message: string;
};

export type CoverageAssessment = {
  categoryId: string;
  categoryName: string;
  status: TerminalState;
  outcome: AssessmentOutcome;
  /** 0..100, one decimal. 0 for no-evidence and failed categories. */
  coveragePercent: number;
  strengths: StrengthExample[];
  gaps: CoverageGap[];
  recommendations: string[];
  summary?: string;
  sourceBreakdown: SourceBreakdown;
  selectedUnits: UnitReference[];
  /** Every state the category passed through, in order. */
  trace: CategoryState[];
  attempts: number;
  failure?: CategoryFailure;
};

export type SourceComparisonNote = {
  categoryId: string;
  dominantOrigin: OriginKind;
  /** Share of selected characters from the dominant origin, 0..1 (two decimals). */
  share: number;
  note: string;
};

export type ReportCaveat = {
  kind: "ExtractionGap";
  origin: OriginKind;
  message: string;
};

export type CoverageSummary = {
  /** Mean coverage over non-FAILED categories; null when every category failed. */
  averageCoverage: number | null;
  categoryCount: number;
  assessedCount: number;
  noRelevantContentCount: number;
  failedCount: number;
};

export type CoverageReport = {
  institution: string;
  generatedAt: string;
  categories: CoverageAssessment[];
  summary: CoverageSummary;
  sourceComparison: SourceComparisonNote[];
  caveats: ReportCaveat[];
  cancelled: boolean;
  settings: TaxonomySettings;
  /**
   * Fixed notes printed with every report so readers do not mistake keyword
   * relevance and model judgments for an audit of the institution.
   */
  limitations: string[];
};
