/** Notes
# entrypoint: public API only
- Extraction (text -> CandidateProfile) and scoring (profile + job -> MatchResult) are pure
- The only shared resource is the semantic backend, built once by the caller and handed to MatchScorer
- Transport, file decoding and storage live outside this package
**/

// configuration
export {
  defaultScoringConfigV1,
  parseScoringConfig,
  parseExperienceBands,
  loadScoringConfigFromEnv,
  DEFAULT_EXPERIENCE_BANDS,
} from "../core/config/scoring"
export type { ScoringConfig, ScoringWeights, FitThresholds, ExperienceBands } from "../core/config/scoring"
export { buildSkillTaxonomy, loadSkillTaxonomy, defaultSkillTaxonomy, canonicalSkill } from "../core/config/taxonomy"
export type { SkillTaxonomy, SkillTaxonomyInput } from "../core/config/taxonomy"

// domain
export * from "../core/domain/errors"
export type {
  CandidateProfile,
  SkillInventory,
  EducationRecord,
  DegreeMention,
  FuzzySkillMatch,
  EducationLevel,
  ExperienceLevel,
  ExtractionDegraded,
  YearsExperienceSource,
} from "../core/domain/profile"
export { EDUCATION_LEVELS, EXPERIENCE_LEVELS } from "../core/domain/profile"
export { parseJobDescription } from "../core/domain/job"
export type { JobDescription, JobDescriptionInput } from "../core/domain/job"
export { MatchScorer, fitLevelFor, NO_GAPS_RECOMMENDATION } from "../core/domain/scoring"
export type { MatchResult, FitLevel, MatchScorerOptions } from "../core/domain/scoring"
export type { SkillMatch, ExperienceMatch, EducationMatch } from "../core/domain/signals"
export { tfidfCosineSimilarity, cosineSimilarity } from "../core/domain/similarity"

// extraction
export { extractProfileV1 } from "../core/extract/assemble"
export type { ExtractProfileOptions } from "../core/extract/assemble"
export { normalizeResumeText } from "../core/extract/normalize"
export { extractSkills, extractSectionSkills } from "../core/extract/skills"
export type { ExtractSkillsOptions } from "../core/extract/skills"

// semantic backend
export type { EmbeddingAdapter, SemanticSimilarity, EmbedInput, EmbedOutput } from "../core/embeddings/adapter"
export { EmbeddingSemanticSimilarity } from "../core/embeddings/semantic"
export { OpenAIEmbeddingAdapter } from "../infra/openai-embedding-adapter"
export type { OpenAIEmbeddingAdapterOptions } from "../infra/openai-embedding-adapter"

// batch
export { scoreBatchV1, DEFAULT_BATCH_CONCURRENCY } from "./engine/run_match_pipeline"
export type { BatchResult, BatchFailure, ScoreBatchArgs } from "./engine/run_match_pipeline"
export { profileSource, textSource } from "./engine/sources"
export type { ProfileSource } from "./engine/sources"

// logging
export { jsonConsoleLogger, silentLogger } from "./lib/log"
export type { Logger, LogFields } from "./lib/log"

export { ENGINE_VERSION, PROFILE_SCHEMA_VERSION } from "../core/versioning/versions"
