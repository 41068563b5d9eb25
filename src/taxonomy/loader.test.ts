import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { budgetFor, defaultTaxonomyPath, loadTaxonomy, parseTaxonomy } from "./loader.js";

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

const financial = (over: Record<string, unknown> = {}) => ({
  id: "financial",
  name: "Financial Information",
  subAspects: ["Tuition and fees", "Scholarships and grants"],
  keywords: [{ term: "tuition", weight: 3 }],
  ...over,
});

describe("loadTaxonomy", () => {
  it("loads the bundled taxonomy", () => {
    const taxonomy = loadTaxonomy(defaultTaxonomyPath());

    expect(taxonomy.categories.map((c) => c.id)).toEqual([
      "admissions",
      "curriculum",
      "research",
      "clinical",
      "financial",
      "student_life",
      "special_programs",
    ]);
    const [admissions] = taxonomy.categories;
    expect(admissions.mustInclude).toEqual(["admissions", "mcat"]);
    expect(admissions.keywords.get("mcat")).toBe(3);
    expect(taxonomy.categories[6].mustInclude).toEqual(["dual degree", "md phd", "global health"]);
    expect(taxonomy.settings.coverage).toEqual({ aggregation: "fraction", dominanceThreshold: 0.75 });
  });

  it("normalizes punctuated keywords", () => {
    const curriculum = loadTaxonomy(defaultTaxonomyPath()).categories[1];
    expect(curriculum.keywords.get("pre clinical")).toBe(2.5);
    expect(curriculum.keywords.get("pass fail")).toBe(2);
  });

  it("fails on an unreadable file", () => {
    expect(() => loadTaxonomy("/nonexistent/taxonomy.json")).toThrow(ConfigurationError);
  });
});

describe("parseTaxonomy", () => {
  it("rejects a term carrying two weights", () => {
    const err = configError(() =>
      parseTaxonomy({
        categories: [
          financial({
            keywords: [
              { term: "Tuition", weight: 3 },
              { term: "tuition", weight: 2 },
            ],
          }),
        ],
      })
    );
    expect(err.issues).toEqual(['category "financial": keyword "tuition" has conflicting weights 3 and 2']);
  });

  it("accepts a repeated term with the same weight", () => {
    const taxonomy = parseTaxonomy({
      categories: [
        financial({
          keywords: [
            { term: "Tuition", weight: 3 },
            { term: "tuition", weight: 3 },
          ],
        }),
      ],
    });
    expect(taxonomy.categories[0].keywords.size).toBe(1);
  });

  it("rejects a weighted must-include term that disagrees with its keyword weight", () => {
    const err = configError(() =>
      parseTaxonomy({ categories: [financial({ mustInclude: [{ term: "Tuition", weight: 1 }] })] })
    );
    expect(err.issues).toEqual([
      'category "financial": must-include term "Tuition" weight 1 conflicts with keyword weight 3',
    ]);
  });

  it("adds must-include terms missing from the keywords to the vocabulary", () => {
    const taxonomy = parseTaxonomy({
      categories: [financial({ mustInclude: ["Financial Aid", { term: "FAFSA", weight: 2 }] })],
    });
    const [category] = taxonomy.categories;
    expect(category.mustInclude).toEqual(["financial aid", "fafsa"]);
    expect(category.keywords.get("financial aid")).toBe(1);
    expect(category.keywords.get("fafsa")).toBe(2);
  });

  it("reports every problem at once", () => {
    const err = configError(() =>
      parseTaxonomy({
        categories: [
          financial({ subAspects: ["Tuition and fees", "tuition and fees"] }),
          financial({ keywords: [{ term: "---", weight: 1 }] }),
        ],
      })
    );
    expect(err.issues).toEqual([
      'category "financial": duplicate sub-aspect "tuition and fees"',
      'duplicate category id "financial"',
      'category "financial": keyword "---" has no letters or digits',
    ]);
  });

  it("reports schema violations with their path", () => {
    const err = configError(() => parseTaxonomy({ categories: [] }));
    expect(err.issues[0]).toMatch(/^categories: /);
  });

  it("applies settings overrides and ignores undefined fields", () => {
    const taxonomy = parseTaxonomy(
      { categories: [financial()] },
      { selection: { defaultBudgetChars: 500 }, coverage: { aggregation: undefined } }
    );
    expect(taxonomy.settings.selection.defaultBudgetChars).toBe(500);
    expect(taxonomy.settings.coverage.aggregation).toBe("fraction");
  });

  it("validates overrides", () => {
    expect(() => parseTaxonomy({ categories: [financial()] }, { scoring: { mustIncludePenalty: 2 } })).toThrow(
      /Invalid settings override/
    );
  });
});

describe("budgetFor", () => {
  it("prefers the category budget over the default", () => {
    const taxonomy = parseTaxonomy({
      categories: [financial({ budgetChars: 1200 }), financial({ id: "research" })],
    });
    const [withBudget, withoutBudget] = taxonomy.categories;
    expect(budgetFor(withBudget, taxonomy.settings)).toBe(1200);
    expect(budgetFor(withoutBudget, taxonomy.settings)).toBe(8000);
  });
});
