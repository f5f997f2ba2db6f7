// core/domain/scoring.ts
import { clamp, round2 } from "../../src/lib/utils";
import { silentLogger, type Logger } from "../../src/lib/log";
import {
  defaultScoringConfigV1,
  parseScoringConfig,
  type FitThresholds,
  type ScoringConfig,
  type ScoringWeights,
} from "../config/scoring";
import type { SkillTaxonomy } from "../config/taxonomy";
import type { SemanticSimilarity } from "../embeddings/adapter";
import { ModelUnavailableError, errorCodeOf, errorMessageOf } from "./errors";
import { jobText, parseJobDescription, type JobDescription } from "./job";
import type { CandidateProfile } from "./profile";
import {
  educationMatchV1,
  experienceMatchV1,
  skillMatchV1,
  type EducationMatch,
  type ExperienceMatch,
  type SkillMatch,
} from "./signals";
import { tfidfCosineSimilarity } from "./similarity";

export type FitLevel = "Excellent" | "Good" | "Fair" | "Poor";

export type MatchResult = {
  candidate_name: string | null;
  filename: string;
  overall_score: number;
  fit_level: FitLevel;
  skill_match: SkillMatch;
  experience_match: ExperienceMatch;
  education_match: EducationMatch;
  text_similarity: number;
  semantic_similarity: number;
  semantic_available: boolean;
  weights_used: ScoringWeights;
  recommendations: string[];
};

export type SubScores = {
  skill: number;
  experience: number;
  education: number;
  text_similarity: number;
  semantic_similarity: number | null; // null = backend unavailable
};

export const NO_GAPS_RECOMMENDATION = "No significant gaps identified; review full profile before deciding";

/** Top-down, inclusive lower bounds. */
export function fitLevelFor(score: number, t: FitThresholds): FitLevel {
  if (score >= t.excellent) return "Excellent";
  if (score >= t.good) return "Good";
  if (score >= t.fair) return "Fair";
  return "Poor";
}

/**
 * Weighted sum of the sub-scores. Without a semantic score its weight is dropped and the
 * remaining weights are rescaled to sum to 1 (all-zero remainder -> overall 0).
 * `raw` is the clamped, unrounded total; fit levels are taken from it.
 */
export function blendScoresV1(
  sub: SubScores,
  weights: ScoringWeights
): { overall: number; raw: number; weights_used: ScoringWeights } {
  let used: ScoringWeights = { ...weights };

  if (sub.semantic_similarity === null) {
    const rest =
      weights.skill_weight + weights.experience_weight + weights.education_weight + weights.text_similarity_weight;
    const scale = rest > 0 ? 1 / rest : 0;
    used = {
      skill_weight: weights.skill_weight * scale,
      experience_weight: weights.experience_weight * scale,
      education_weight: weights.education_weight * scale,
      text_similarity_weight: weights.text_similarity_weight * scale,
      semantic_similarity_weight: 0,
    };
  }

  const total =
    sub.skill * used.skill_weight +
    sub.experience * used.experience_weight +
    sub.education * used.education_weight +
    sub.text_similarity * used.text_similarity_weight +
    (sub.semantic_similarity ?? 0) * used.semantic_similarity_weight;

  const raw = clamp(total, 0, 100);
  return { overall: round2(raw), raw, weights_used: used };
}

export function buildRecommendationsV1(args: {
  fit_level: FitLevel;
  skill_match: SkillMatch;
  experience_match: ExperienceMatch;
  education_match: EducationMatch;
}): string[] {
  const out: string[] = [];

  if (args.fit_level === "Excellent") out.push("Highly recommended for interview");
  if (args.skill_match.missing_skills.length) {
    out.push(`Consider additional training in: ${args.skill_match.missing_skills.join(", ")}`);
  }
  if (!args.experience_match.meets_requirement) {
    out.push(`Experience gap of ${round2(Math.abs(args.experience_match.difference))} years`);
  }
  if (!args.education_match.meets_requirement) out.push("Does not meet minimum education requirement");

  if (!out.length) out.push(NO_GAPS_RECOMMENDATION);
  return out;
}

export type MatchScorerOptions = {
  config?: unknown; // validated with parseScoringConfig; defaults to defaultScoringConfigV1()
  semantic?: SemanticSimilarity | null;
  taxonomy?: SkillTaxonomy | null;
  logger?: Logger;
};

export class MatchScorer {
  readonly config: ScoringConfig;
  private semantic: SemanticSimilarity | null;
  private taxonomy: SkillTaxonomy | null;
  private logger: Logger;

  constructor(opts: MatchScorerOptions = {}) {
    // throws InvalidConfigurationError before any candidate is scored
    this.config = parseScoringConfig(opts.config ?? defaultScoringConfigV1());
    this.semantic = opts.semantic ?? null;
    this.taxonomy = opts.taxonomy ?? null;
    this.logger = opts.logger ?? silentLogger;
  }

  async score(profile: CandidateProfile, jobInput: unknown): Promise<MatchResult> {
    const job = parseJobDescription(jobInput);
    const cfg = this.config;

    const skill_match = skillMatchV1(profile.skills.skills, job.required_skills, this.taxonomy);
    const experience_match = experienceMatchV1(profile.years_experience, job.required_years, cfg);
    const education_match = educationMatchV1(profile.education.highest_level, job.required_education, cfg);

    const jt = jobText(job);
    const text_similarity = round2(tfidfCosineSimilarity(profile.source_text, jt) * 100);
    const semantic = await this.semanticScore(profile, job, jt);

    const { overall, raw, weights_used } = blendScoresV1(
      {
        skill: skill_match.match_percentage,
        experience: experience_match.score,
        education: education_match.score,
        text_similarity,
        semantic_similarity: semantic,
      },
      cfg.weights
    );

    // 84.996 shows as 85 but is still "Good"
    const fit_level = fitLevelFor(raw, cfg.fit_thresholds);

    return {
      candidate_name: profile.name,
      filename: profile.source,
      overall_score: overall,
      fit_level,
      skill_match,
      experience_match,
      education_match,
      text_similarity,
      semantic_similarity: semantic ?? 0,
      semantic_available: semantic !== null,
      weights_used,
      recommendations: buildRecommendationsV1({ fit_level, skill_match, experience_match, education_match }),
    };
  }

  /** 0..100, or null when there is no backend or it reported ModelUnavailable. */
  private async semanticScore(profile: CandidateProfile, job: JobDescription, jt: string): Promise<number | null> {
    if (!this.semantic) return null;

    try {
      const cos = await this.semantic.similarity(jt, profile.source_text);
      if (!Number.isFinite(cos)) throw new ModelUnavailableError("SEMANTIC_NOT_A_NUMBER");
      return round2(clamp(cos, 0, 1) * 100);
    } catch (e) {
      if (!(e instanceof ModelUnavailableError)) throw e;
      this.logger.warn("semantic_unavailable", {
        filename: profile.source,
        jobTitle: job.title,
        code: errorCodeOf(e),
        err: errorMessageOf(e),
      });
      return null;
    }
  }
}
