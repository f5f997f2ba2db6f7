// core/config/taxonomy.ts
import { readFileSync } from "node:fs";
import { z } from "zod";

import { InvalidConfigurationError } from "../domain/errors";
import type { TermEntry } from "../extract/terms";

const DEFAULT_TAXONOMY_URL = new URL("../../data/skill_taxonomy.json", import.meta.url);

const nameList = z.array(z.string().trim().min(1));

export const skillTaxonomySchema = z
  .object({
    version: z.string().trim().min(1),
    categories: z.record(nameList.min(1)),
    synonyms: z.record(nameList).default({}),
    certifications: nameList.default([]),
    ambiguous: nameList.default([]),
  })
  .strict();

export type SkillTaxonomyInput = z.input<typeof skillTaxonomySchema>;

/** Read-only lookup structure built once from a taxonomy file and shared by every extraction. */
export interface SkillTaxonomy {
  readonly version: string;
  readonly categories: Readonly<Record<string, readonly string[]>>;
  readonly categoryOrder: readonly string[];
  /** lowercase canonical name or alias -> canonical name */
  readonly canonicalByKey: ReadonlyMap<string, string>;
  readonly terms: ReadonlyArray<TermEntry<string>>;
  /** lowercase terms that double as everyday words ("go", "rest", "swift") */
  readonly ambiguous: ReadonlySet<string>;
  readonly certifications: readonly string[];
}

export function buildSkillTaxonomy(input: unknown): SkillTaxonomy {
  const parsed = skillTaxonomySchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError("SKILL_TAXONOMY_INVALID", parsed.error.issues);
  }
  const { version, categories, synonyms, certifications, ambiguous } = parsed.data;

  const canonicalByKey = new Map<string, string>();
  const categoryOut: Record<string, string[]> = {};

  for (const [category, skills] of Object.entries(categories)) {
    const list: string[] = [];
    for (const raw of skills) {
      const key = raw.toLowerCase();
      // same skill listed under two categories keeps its first spelling
      const canonical = canonicalByKey.get(key) ?? raw;
      canonicalByKey.set(key, canonical);
      if (!list.includes(canonical)) list.push(canonical);
    }
    categoryOut[category] = list;
  }

  const terms: TermEntry<string>[] = [...new Set(canonicalByKey.values())].map((c) => ({ term: c, value: c }));
  const aliasOwner = new Map<string, string>();

  for (const [rawCanonical, aliases] of Object.entries(synonyms)) {
    const canonical = canonicalByKey.get(rawCanonical.trim().toLowerCase());
    if (!canonical) {
      throw new InvalidConfigurationError(`SKILL_TAXONOMY_UNKNOWN_SYNONYM_TARGET: ${rawCanonical}`);
    }
    for (const alias of aliases) {
      const key = alias.toLowerCase();
      if (canonicalByKey.has(key) && !aliasOwner.has(key)) {
        throw new InvalidConfigurationError(`SKILL_TAXONOMY_ALIAS_SHADOWS_SKILL: ${alias}`);
      }
      const owner = aliasOwner.get(key);
      if (owner && owner !== canonical) {
        throw new InvalidConfigurationError(`SKILL_TAXONOMY_AMBIGUOUS_ALIAS: ${alias} (${owner}, ${canonical})`);
      }
      aliasOwner.set(key, canonical);
      canonicalByKey.set(key, canonical);
      terms.push({ term: alias, value: canonical });
    }
  }

  const ambiguousKeys = new Set<string>();
  for (const term of ambiguous) {
    const key = term.toLowerCase();
    if (!canonicalByKey.has(key)) {
      throw new InvalidConfigurationError(`SKILL_TAXONOMY_UNKNOWN_AMBIGUOUS_TERM: ${term}`);
    }
    ambiguousKeys.add(key);
  }

  return Object.freeze({
    version,
    categories: Object.freeze(categoryOut),
    categoryOrder: Object.freeze(Object.keys(categoryOut)),
    canonicalByKey,
    terms: Object.freeze(terms),
    ambiguous: ambiguousKeys,
    certifications: Object.freeze([...new Set(certifications)]),
  });
}

export function loadSkillTaxonomy(path: string | URL = DEFAULT_TAXONOMY_URL): SkillTaxonomy {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (err) {
    throw new InvalidConfigurationError(`SKILL_TAXONOMY_UNREADABLE: ${String(path)}`, err instanceof Error ? err.message : err);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new InvalidConfigurationError("SKILL_TAXONOMY_NOT_JSON", err instanceof Error ? err.message : err);
  }
  return buildSkillTaxonomy(json);
}

let bundled: SkillTaxonomy | null = null;

/** The taxonomy shipped in data/skill_taxonomy.json, loaded once per process. */
export function defaultSkillTaxonomy(): SkillTaxonomy {
  if (!bundled) bundled = loadSkillTaxonomy();
  return bundled;
}

/** Resolves aliases ("JS", "k8s") to their canonical skill; unknown names come back trimmed. */
export function canonicalSkill(taxonomy: SkillTaxonomy | null | undefined, name: string): string {
  const trimmed = String(name || "").trim();
  return taxonomy?.canonicalByKey.get(trimmed.toLowerCase()) ?? trimmed;
}
