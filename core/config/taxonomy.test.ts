import { describe, expect, it } from "vitest";

import { InvalidConfigurationError } from "../domain/errors";
import { buildSkillTaxonomy, canonicalSkill, defaultSkillTaxonomy, loadSkillTaxonomy } from "./taxonomy";

describe("buildSkillTaxonomy", () => {
  it("resolves aliases to canonical names", () => {
    const t = buildSkillTaxonomy({
      version: "t",
      categories: { languages: ["JavaScript"] },
      synonyms: { JavaScript: ["JS"] },
    });
    expect(canonicalSkill(t, "js")).toBe("JavaScript");
    expect(canonicalSkill(t, " Rust ")).toBe("Rust");
    expect(canonicalSkill(null, " JS ")).toBe("JS");
    expect(t.categoryOrder).toEqual(["languages"]);
    expect(t.certifications).toEqual([]);
  });

  it("rejects a schema violation with the zod issues", () => {
    try {
      buildSkillTaxonomy({ version: "t", categories: { languages: [] } });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidConfigurationError);
      if (e instanceof InvalidConfigurationError) {
        expect(e.code).toBe("INVALID_CONFIGURATION");
        expect(e.message).toBe("SKILL_TAXONOMY_INVALID");
        expect(Array.isArray(e.details)).toBe(true);
      }
    }
  });

  it("rejects synonyms for unknown skills", () => {
    expect(() =>
      buildSkillTaxonomy({ version: "t", categories: { a: ["Python"] }, synonyms: { Rust: ["rs"] } })
    ).toThrow("SKILL_TAXONOMY_UNKNOWN_SYNONYM_TARGET: Rust");
  });

  it("rejects an alias that is itself a skill", () => {
    expect(() =>
      buildSkillTaxonomy({ version: "t", categories: { a: ["Python", "Py"] }, synonyms: { Python: ["py"] } })
    ).toThrow("SKILL_TAXONOMY_ALIAS_SHADOWS_SKILL: py");
  });

  it("rejects an alias shared by two skills", () => {
    expect(() =>
      buildSkillTaxonomy({
        version: "t",
        categories: { a: ["Go", "Golang Tools"] },
        synonyms: { Go: ["golang"], "Golang Tools": ["golang"] },
      })
    ).toThrow("SKILL_TAXONOMY_AMBIGUOUS_ALIAS: golang (Go, Golang Tools)");
  });

  it("keeps ambiguous terms as lowercase keys", () => {
    const t = buildSkillTaxonomy({ version: "t", categories: { a: ["Go", "REST"] }, ambiguous: ["Go", "rest"] });
    expect([...t.ambiguous]).toEqual(["go", "rest"]);
  });

  it("rejects ambiguous terms that are not in the taxonomy", () => {
    expect(() => buildSkillTaxonomy({ version: "t", categories: { a: ["Go"] }, ambiguous: ["Swift"] })).toThrow(
      "SKILL_TAXONOMY_UNKNOWN_AMBIGUOUS_TERM: Swift"
    );
  });
});

describe("loadSkillTaxonomy", () => {
  it("loads the bundled taxonomy", () => {
    const t = defaultSkillTaxonomy();
    expect(t.categoryOrder[0]).toBe("programming_languages");
    expect(canonicalSkill(t, "k8s")).toBe("Kubernetes");
    expect(t.ambiguous.has("go")).toBe(true);
    expect(defaultSkillTaxonomy()).toBe(t);
  });

  it("reports unreadable files as configuration errors", () => {
    expect(() => loadSkillTaxonomy("/nonexistent/taxonomy.json")).toThrow(InvalidConfigurationError);
  });
});
