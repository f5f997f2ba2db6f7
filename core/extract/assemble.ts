// core/extract/assemble.ts
import { DEFAULT_EXPERIENCE_BANDS, type ExperienceBands } from "../config/scoring"
import { defaultSkillTaxonomy, type SkillTaxonomy } from "../config/taxonomy"
import type { CandidateProfile, ExtractionDegraded } from "../domain/profile"
import { ENGINE_VERSION, PROFILE_SCHEMA_VERSION } from "../versioning/versions"
import { extractContactInfo } from "./contact"
import { extractCertifications, extractEducation } from "./education"
import { experienceLevelFor, extractYearsOfExperience } from "./experience"
import { normalizeResumeText } from "./normalize"
import { extractSectionSkills, extractSkills } from "./skills"

export type ExtractProfileOptions = {
  source: string
  taxonomy?: SkillTaxonomy
  /**
   * What "Present" / "current" in a date range resolve to. Defaults to the wall clock, so pass it
   * when the same text must always give the same profile. Recorded as meta.reference_date.
   */
  now?: Date
  experienceBands?: ExperienceBands
}

const trimOrNull = (s: string | null) => (s == null ? null : s.trim() || null)

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const v of Object.values(value)) deepFreeze(v)
  }
  return value
}

/**
 * Raw resume text -> immutable CandidateProfile.
 * Never throws for unrecognized fields: they stay null/default and are listed in meta.degraded.
 */
export function extractProfileV1(rawText: string, opts: ExtractProfileOptions): CandidateProfile {
  const taxonomy = opts.taxonomy ?? defaultSkillTaxonomy()
  const now = opts.now ?? new Date()
  const bands = opts.experienceBands ?? DEFAULT_EXPERIENCE_BANDS

  const text = normalizeResumeText(rawText)
  const degraded: ExtractionDegraded[] = []

  const contact = extractContactInfo(text)
  const name = trimOrNull(contact.name)
  const email = trimOrNull(contact.email)
  const phone = trimOrNull(contact.phone)
  const linkedin = trimOrNull(contact.linkedin)
  const github = trimOrNull(contact.github)

  if (!name) degraded.push({ field: "name", reason: "NAME_NOT_FOUND" })
  if (!email) degraded.push({ field: "email", reason: "EMAIL_NOT_FOUND" })
  if (!phone) degraded.push({ field: "phone", reason: "PHONE_NOT_FOUND" })
  if (!linkedin) degraded.push({ field: "linkedin", reason: "LINKEDIN_NOT_FOUND" })
  if (!github) degraded.push({ field: "github", reason: "GITHUB_NOT_FOUND" })

  const experience = extractYearsOfExperience(text, now)
  if (experience.source === "none") {
    degraded.push({ field: "years_experience", reason: "NO_EXPERIENCE_STATEMENT_OR_DATES" })
  }

  const skills = extractSkills(text, taxonomy)
  if (skills.total_skills === 0) degraded.push({ field: "skills", reason: "NO_TAXONOMY_SKILLS" })

  const education = extractEducation(text)
  if (education.highest_level === "none") degraded.push({ field: "education", reason: "NO_DEGREE_MENTION" })

  const profile: CandidateProfile = {
    schema_version: PROFILE_SCHEMA_VERSION,
    source: opts.source,

    name,
    email,
    phone,
    linkedin,
    github,

    years_experience: experience.years,
    years_experience_source: experience.source,
    experience_level: experienceLevelFor(experience.years, bands),

    skills,
    education,
    certifications: extractCertifications(text, taxonomy),
    section_skills: extractSectionSkills(text, taxonomy),

    source_text: text,

    meta: {
      engine_version: ENGINE_VERSION,
      taxonomy_version: taxonomy.version,
      reference_date: now.toISOString(),
      degraded,
    },
  }

  return deepFreeze(profile)
}
