import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ZodError } from "zod";
import { ConfigurationError } from "../errors.js";
import { normalizeForMatch } from "../analysis/textUtils.js";
import {
  taxonomyFileSchema,
  taxonomySettingsSchema,
  type CategoryConfig,
  type CategoryDefinition,
  type SettingsOverrides,
  type Taxonomy,
  type TaxonomySettings,
} from "./schema.js";

/**
 * Locates `config/taxonomy.json` at the package root, whether this module runs
 * from `src/taxonomy` (tsx, vitest) or from `dist/src/taxonomy` (built).
 */
export function defaultTaxonomyPath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(here, "../../config/taxonomy.json"),
    path.resolve(here, "../../../config/taxonomy.json"),
  ];
  return candidates.find((p) => fs.existsSync(p)) ?? candidates[0];
}

export function loadTaxonomy(filePath: string, overrides?: SettingsOverrides): Taxonomy {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read taxonomy ${filePath}`, [reason]);
  }
  return parseTaxonomy(raw, overrides);
}

/**
 * Validates a taxonomy document and compiles each category's vocabulary.
 *
 * Fails with one `ConfigurationError` listing every problem found: schema
 * violations, duplicate category ids or sub-aspects, terms that normalize to
 * nothing, and the same term carrying two different weights.
 */
export function parseTaxonomy(raw: unknown, overrides?: SettingsOverrides): Taxonomy {
  const parsed = taxonomyFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid taxonomy", formatZodIssues(parsed.error));
  }

  const settings = applyOverrides(parsed.data.settings, overrides);
  const issues: string[] = [];
  const seenIds = new Set<string>();
  const categories: CategoryDefinition[] = [];

  for (const cfg of parsed.data.categories) {
    if (seenIds.has(cfg.id)) issues.push(`duplicate category id "${cfg.id}"`);
    seenIds.add(cfg.id);
    categories.push(compileCategory(cfg, settings, issues));
  }

  if (issues.length) throw new ConfigurationError("Invalid taxonomy", issues);

  return Object.freeze({ version: parsed.data.version, settings, categories: Object.freeze(categories) });
}

function compileCategory(cfg: CategoryConfig, settings: TaxonomySettings, issues: string[]): CategoryDefinition {
  const where = `category "${cfg.id}"`;
  const keywords = new Map<string, number>();

  for (const k of cfg.keywords) {
    const term = normalizeForMatch(k.term);
    if (!term) {
      issues.push(`${where}: keyword "${k.term}" has no letters or digits`);
      continue;
    }
    const prev = keywords.get(term);
    if (prev !== undefined && prev !== k.weight) {
      issues.push(`${where}: keyword "${k.term}" has conflicting weights ${prev} and ${k.weight}`);
      continue;
    }
    keywords.set(term, k.weight);
  }

  const mustInclude: string[] = [];
  for (const entry of cfg.mustInclude) {
    const original = typeof entry === "string" ? entry : entry.term;
    const weight = typeof entry === "string" ? undefined : entry.weight;
    const term = normalizeForMatch(original);
    if (!term) {
      issues.push(`${where}: must-include term "${original}" has no letters or digits`);
      continue;
    }
    const keywordWeight = keywords.get(term);
    if (weight !== undefined && keywordWeight !== undefined && keywordWeight !== weight) {
      issues.push(
        `${where}: must-include term "${original}" weight ${weight} conflicts with keyword weight ${keywordWeight}`
      );
      continue;
    }
    if (keywordWeight === undefined) {
      keywords.set(term, weight ?? settings.scoring.mustIncludeDefaultWeight);
    }
    if (!mustInclude.includes(term)) mustInclude.push(term);
  }

  const aspectKeys = new Set<string>();
  for (const aspect of cfg.subAspects) {
    const key = normalizeForMatch(aspect);
    if (aspectKeys.has(key)) issues.push(`${where}: duplicate sub-aspect "${aspect}"`);
    aspectKeys.add(key);
  }

  return Object.freeze({
    id: cfg.id,
    name: cfg.name,
    description: cfg.description,
    subAspects: Object.freeze([...cfg.subAspects]),
    mustInclude: Object.freeze(mustInclude),
    keywords,
    budgetChars: cfg.budgetChars,
  });
}

function applyOverrides(settings: TaxonomySettings, overrides?: SettingsOverrides): TaxonomySettings {
  if (!overrides) return settings;
  const merged = taxonomySettingsSchema.safeParse({
    scoring: { ...settings.scoring, ...definedOnly(overrides.scoring) },
    selection: { ...settings.selection, ...definedOnly(overrides.selection) },
    coverage: { ...settings.coverage, ...definedOnly(overrides.coverage) },
  });
  if (!merged.success) {
    throw new ConfigurationError("Invalid settings override", formatZodIssues(merged.error));
  }
  return merged.data;
}

function definedOnly(obj: object | undefined): Record<string, unknown> {
  if (!obj) return {};
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`);
}

/** Selection budget in characters for one category. */
export function budgetFor(category: CategoryDefinition, settings: TaxonomySettings): number {
  return category.budgetChars ?? settings.selection.defaultBudgetChars;
}
