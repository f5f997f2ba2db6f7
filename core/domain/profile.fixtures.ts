import { PROFILE_SCHEMA_VERSION, ENGINE_VERSION } from "../versioning/versions"
import type { CandidateProfile, EducationLevel } from "./profile"
import { educationRank } from "./profile"

/** Hand-built profile for scorer and batch tests, bypassing text extraction. */
export function makeProfile(p: {
  source: string
  name?: string | null
  skills?: string[]
  years?: number
  education?: EducationLevel
  text?: string
}): CandidateProfile {
  const skills = p.skills ?? []
  const level = p.education ?? "none"

  return {
    schema_version: PROFILE_SCHEMA_VERSION,
    source: p.source,
    name: p.name ?? null,
    email: null,
    phone: null,
    linkedin: null,
    github: null,
    years_experience: p.years ?? 0,
    years_experience_source: p.years == null ? "none" : "stated",
    experience_level: "entry",
    skills: {
      skills,
      total_skills: skills.length,
      categories: {},
      mention_count: Object.fromEntries(skills.map((s) => [s, 1])),
      fuzzy_matches: [],
    },
    education: {
      highest_level: level,
      has_degree: educationRank(level) >= educationRank("bachelors"),
      degree_mentions: level === "none" ? [] : [{ text: level, level }],
    },
    certifications: [],
    section_skills: {},
    source_text: p.text ?? "",
    meta: {
      engine_version: ENGINE_VERSION,
      taxonomy_version: "test",
      reference_date: "2024-01-01T00:00:00.000Z",
      degraded: [],
    },
  }
}
