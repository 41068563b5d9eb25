import { z } from "zod";

const termSchema = z.string().trim().min(1);

const weightedTermSchema = z.object({
  term: termSchema,
  weight: z.number().finite().positive(),
});

export const scoringSettingsSchema = z.object({
  /** Multiplier applied when a unit matches none of the category's must-include terms. */
  mustIncludePenalty: z.number().gt(0).lt(1).default(0.5),
  /** Weight given to a must-include term that is not also listed as a keyword. */
  mustIncludeDefaultWeight: z.number().finite().positive().default(1),
  normalizeByLength: z.boolean().default(true),
  /** Units up to this many words are scored without length damping. */
  lengthReferenceWords: z.number().int().positive().default(100),
});

export const selectionSettingsSchema = z.object({
  defaultBudgetChars: z.number().int().positive().default(8000),
});

export const coverageSettingsSchema = z.object({
  aggregation: z.enum(["fraction", "confidence"]).default("fraction"),
  /** Share of selected characters from one origin at which the report notes that origin dominates. */
  dominanceThreshold: z.number().gt(0.5).max(1).default(0.75),
});

export const taxonomySettingsSchema = z.object({
  scoring: scoringSettingsSchema.default({}),
  selection: selectionSettingsSchema.default({}),
  coverage: coverageSettingsSchema.default({}),
});

export const categoryConfigSchema = z.object({
  id: z.string().regex(/^[a-z][a-z0-9_]*$/, "must be lower_snake_case"),
  name: z.string().trim().min(1),
  description: z.string().default(""),
  subAspects: z.array(termSchema).min(1),
  mustInclude: z.array(z.union([termSchema, weightedTermSchema])).default([]),
  keywords: z.array(weightedTermSchema).min(1),
  budgetChars: z.number().int().positive().optional(),
});

export const taxonomyFileSchema = z.object({
  version: z.number().int().positive().default(1),
  settings: taxonomySettingsSchema.default({}),
  categories: z.array(categoryConfigSchema).min(1),
});

export type ScoringSettings = z.infer<typeof scoringSettingsSchema>;
export type SelectionSettings = z.infer<typeof selectionSettingsSchema>;
export type CoverageSettings = z.infer<typeof coverageSettingsSchema>;
export type CoverageAggregation = CoverageSettings["aggregation"];
export type TaxonomySettings = z.infer<typeof taxonomySettingsSchema>;
export type CategoryConfig = z.infer<typeof categoryConfigSchema>;

export type SettingsOverrides = {
  scoring?: Partial<ScoringSettings>;
  selection?: Partial<SelectionSettings>;
  coverage?: Partial<CoverageSettings>;
};

/**
 * Validated, normalized category.
 *
 * `keywords` is the full scoring vocabulary keyed by normalized term: the
 * configured keywords plus every must-include term. `mustInclude` holds
 * normalized terms.
 */
export type CategoryDefinition = {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly subAspects: readonly string[];
  readonly mustInclude: readonly string[];
  readonly keywords: ReadonlyMap<string, number>;
  readonly budgetChars?: number;
};

export type Taxonomy = {
  readonly version: number;
  readonly settings: TaxonomySettings;
  readonly categories: readonly CategoryDefinition[];
};
