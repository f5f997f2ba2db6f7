/*
Nullable everywhere = an unrecognized field is "unknown", never a guessed fact

Degradations are first-class (meta.degraded lists what fell back to a default)

meta.engine_version + taxonomy_version give audit + reproducibility
*/
export const EDUCATION_LEVELS = ["none", "high_school", "associate", "bachelors", "masters", "doctorate"] as const
export type EducationLevel = (typeof EDUCATION_LEVELS)[number]

export const EXPERIENCE_LEVELS = ["entry", "mid", "senior", "lead"] as const
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number]

export type YearsExperienceSource = "stated" | "date_range" | "none"

export type ProfileField = "name" | "email" | "phone" | "linkedin" | "github" | "years_experience" | "education" | "skills"

export interface ExtractionDegraded {
  field: ProfileField
  reason: string
}

export interface FuzzySkillMatch {
  skill: string                                      // canonical
  text: string                                       // the near-miss as written, e.g. "Kubernets"
  similarity: number                                 // 0..100
}

export interface SkillInventory {
  skills: readonly string[]                          // canonical, unique; exact and fuzzy
  total_skills: number
  categories: Readonly<Record<string, readonly string[]>>
  mention_count: Readonly<Record<string, number>>    // exact occurrences only
  fuzzy_matches: readonly FuzzySkillMatch[]          // skills found only by near-miss spelling
}

export interface DegreeMention {
  text: string                                       // as written in the resume
  level: EducationLevel
}

export interface EducationRecord {
  highest_level: EducationLevel
  has_degree: boolean                                // highest_level >= bachelors
  degree_mentions: readonly DegreeMention[]
}

export interface CandidateProfile {
  schema_version: "1.0"
  source: string                                     // filename or document id

  name: string | null
  email: string | null
  phone: string | null
  linkedin: string | null
  github: string | null

  years_experience: number
  years_experience_source: YearsExperienceSource     // "none" = estimate of zero, not a confirmed zero
  experience_level: ExperienceLevel

  skills: SkillInventory
  education: EducationRecord
  certifications: readonly string[]
  section_skills: Readonly<Record<string, readonly string[]>>  // section name -> skills named there

  source_text: string

  meta: {
    engine_version: string
    taxonomy_version: string
    reference_date: string                           // ISO instant "Present" resolved to
    degraded: readonly ExtractionDegraded[]
  }
}

export function educationRank(level: EducationLevel): number {
  return EDUCATION_LEVELS.indexOf(level)
}

export function maxEducationLevel(levels: Iterable<EducationLevel>): EducationLevel {
  let best: EducationLevel = "none"
  for (const l of levels) {
    if (educationRank(l) > educationRank(best)) best = l
  }
  return best
}
