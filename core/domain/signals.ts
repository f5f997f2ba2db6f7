// core/domain/signals.ts
// Per-signal sub-scores. Each one is pure and returns its own evidence next to the score.

import { round2 } from "../../src/lib/utils";
import type { ScoringConfig } from "../config/scoring";
import { canonicalSkill, type SkillTaxonomy } from "../config/taxonomy";
import { dedupeCaseInsensitive } from "./job";
import { educationRank, type EducationLevel } from "./profile";

export type SkillMatch = {
  matched_skills: string[]; // job spelling, job order
  missing_skills: string[]; // job spelling, job order
  extra_skills: string[]; // candidate spelling, candidate order
  match_percentage: number;
  total_required: number;
  total_matched: number;
};

export type ExperienceMatch = {
  required_years: number | null;
  candidate_years: number;
  difference: number;
  meets_requirement: boolean;
  score: number;
};

export type EducationMatch = {
  required_level: EducationLevel | null;
  candidate_level: EducationLevel;
  meets_requirement: boolean;
  score: number;
};

// --- skills ---

function skillKey(taxonomy: SkillTaxonomy | null | undefined, name: string): string {
  return canonicalSkill(taxonomy, name).toLowerCase();
}

/**
 * With a taxonomy, "JS" and "JavaScript" are the same skill on both sides.
 * Without one, comparison is by trimmed lowercase name.
 */
export function skillMatchV1(
  candidateSkills: readonly string[],
  requiredSkills: readonly string[],
  taxonomy?: SkillTaxonomy | null
): SkillMatch {
  const keyOf = (s: string) => skillKey(taxonomy, s);

  const required = dedupeCaseInsensitive(
    requiredSkills.map((s) => s.trim()).filter(Boolean),
    keyOf
  );
  const candidate = dedupeCaseInsensitive(
    candidateSkills.map((s) => s.trim()).filter(Boolean),
    keyOf
  );

  const candidateKeys = new Set(candidate.map(keyOf));
  const requiredKeys = new Set(required.map(keyOf));

  const matched_skills = required.filter((s) => candidateKeys.has(keyOf(s)));
  const missing_skills = required.filter((s) => !candidateKeys.has(keyOf(s)));
  const extra_skills = candidate.filter((s) => !requiredKeys.has(keyOf(s)));

  // no requirement = trivially satisfied
  const match_percentage = required.length ? round2((100 * matched_skills.length) / required.length) : 100;

  return {
    matched_skills,
    missing_skills,
    extra_skills,
    match_percentage,
    total_required: required.length,
    total_matched: matched_skills.length,
  };
}

// --- experience ---

/**
 * Full marks at or above the requirement; below it the score falls linearly
 * (half the years = 50) and never under the configured floor.
 */
export function experienceMatchV1(
  candidateYears: number,
  requiredYears: number | null | undefined,
  config: Pick<ScoringConfig, "experience">
): ExperienceMatch {
  const years = Number.isFinite(candidateYears) && candidateYears > 0 ? candidateYears : 0;
  const req = requiredYears != null && Number.isFinite(requiredYears) && requiredYears > 0 ? requiredYears : 0;

  const diff = years - req;
  const meets = diff >= 0;

  let score = 100;
  if (!meets && req > 0) {
    score = Math.max(config.experience.floor_score, 100 * (1 + diff / req));
  }

  return {
    required_years: requiredYears ?? null,
    candidate_years: years,
    difference: round2(diff),
    meets_requirement: meets,
    score: round2(score),
  };
}

// --- education ---

export function educationMatchV1(
  candidateLevel: EducationLevel,
  requiredLevel: EducationLevel | null | undefined,
  config: Pick<ScoringConfig, "education">
): EducationMatch {
  const required_level = requiredLevel ?? null;

  let meets = true;
  let score = 100;

  if (required_level && required_level !== "none" && educationRank(candidateLevel) < educationRank(required_level)) {
    meets = false;
    score = candidateLevel === "none" ? config.education.no_education_score : config.education.partial_score;
  }

  return {
    required_level,
    candidate_level: candidateLevel,
    meets_requirement: meets,
    score: round2(score),
  };
}
