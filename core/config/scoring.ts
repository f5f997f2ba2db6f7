// core/config/scoring.ts
import { z } from "zod";

import { InvalidConfigurationError } from "../domain/errors";

export const WEIGHT_SUM_TOLERANCE = 1e-6;

const weight = z.number().finite().min(0);
const score = z.number().finite().min(0).max(100);
const years = z.number().finite().min(0);

export const scoringWeightsSchema = z
  .object({
    skill_weight: weight,
    experience_weight: weight,
    education_weight: weight,
    text_similarity_weight: weight,
    semantic_similarity_weight: weight,
  })
  .strict()
  .superRefine((w, ctx) => {
    const sum =
      w.skill_weight + w.experience_weight + w.education_weight + w.text_similarity_weight + w.semantic_similarity_weight;
    if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `weights must sum to 1.0 (got ${sum})` });
    }
  });

export const fitThresholdsSchema = z
  .object({ excellent: score, good: score, fair: score })
  .strict()
  .refine((t) => t.excellent > t.good && t.good > t.fair, {
    message: "fit thresholds must satisfy excellent > good > fair",
  });

export const experienceBandsSchema = z
  .object({ mid: years, senior: years, lead: years })
  .strict()
  .refine((b) => b.mid < b.senior && b.senior < b.lead, {
    message: "experience bands must satisfy mid < senior < lead",
  });

export const scoringConfigSchema = z
  .object({
    weights: scoringWeightsSchema,
    fit_thresholds: fitThresholdsSchema,
    experience: z.object({ floor_score: score }).strict(),
    education: z.object({ partial_score: score, no_education_score: score }).strict(),
    experience_bands: experienceBandsSchema,
  })
  .strict();

export type ScoringWeights = z.infer<typeof scoringWeightsSchema>;
export type FitThresholds = z.infer<typeof fitThresholdsSchema>;
export type ExperienceBands = z.infer<typeof experienceBandsSchema>;
export type ScoringConfig = z.infer<typeof scoringConfigSchema>;

export const DEFAULT_EXPERIENCE_BANDS: Readonly<ExperienceBands> = Object.freeze({ mid: 2, senior: 5, lead: 10 });

export function defaultScoringConfigV1(): ScoringConfig {
  return {
    weights: {
      skill_weight: 0.4,
      experience_weight: 0.2,
      education_weight: 0.15,
      text_similarity_weight: 0.15,
      semantic_similarity_weight: 0.1,
    },
    fit_thresholds: { excellent: 85, good: 70, fair: 50 },
    // below the requirement the experience score decays linearly towards this floor
    experience: { floor_score: 0 },
    education: { partial_score: 50, no_education_score: 0 },
    experience_bands: { ...DEFAULT_EXPERIENCE_BANDS },
  };
}

function fail(label: string, err: z.ZodError): never {
  throw new InvalidConfigurationError(`${label}: ${err.issues.map((i) => i.message).join("; ")}`, err.issues);
}

export function parseScoringConfig(input: unknown): ScoringConfig {
  const parsed = scoringConfigSchema.safeParse(input);
  if (!parsed.success) fail("SCORING_CONFIG_INVALID", parsed.error);
  return parsed.data;
}

export function parseExperienceBands(input: unknown): ExperienceBands {
  const parsed = experienceBandsSchema.safeParse(input);
  if (!parsed.success) fail("EXPERIENCE_BANDS_INVALID", parsed.error);
  return parsed.data;
}

type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new InvalidConfigurationError(`ENV_NOT_A_NUMBER: ${key}=${raw}`);
  return n;
}

/**
 * Defaults overridden by MATCH_* environment variables, then validated.
 * Tuning goes here, never into the scorer.
 */
export function loadScoringConfigFromEnv(env: Env = process.env): ScoringConfig {
  const d = defaultScoringConfigV1();

  return parseScoringConfig({
    weights: {
      skill_weight: envNumber(env, "MATCH_SKILL_WEIGHT", d.weights.skill_weight),
      experience_weight: envNumber(env, "MATCH_EXPERIENCE_WEIGHT", d.weights.experience_weight),
      education_weight: envNumber(env, "MATCH_EDUCATION_WEIGHT", d.weights.education_weight),
      text_similarity_weight: envNumber(env, "MATCH_TEXT_SIMILARITY_WEIGHT", d.weights.text_similarity_weight),
      semantic_similarity_weight: envNumber(env, "MATCH_SEMANTIC_SIMILARITY_WEIGHT", d.weights.semantic_similarity_weight),
    },
    fit_thresholds: {
      excellent: envNumber(env, "MATCH_FIT_EXCELLENT", d.fit_thresholds.excellent),
      good: envNumber(env, "MATCH_FIT_GOOD", d.fit_thresholds.good),
      fair: envNumber(env, "MATCH_FIT_FAIR", d.fit_thresholds.fair),
    },
    experience: {
      floor_score: envNumber(env, "MATCH_EXPERIENCE_FLOOR_SCORE", d.experience.floor_score),
    },
    education: {
      partial_score: envNumber(env, "MATCH_EDUCATION_PARTIAL_SCORE", d.education.partial_score),
      no_education_score: envNumber(env, "MATCH_EDUCATION_NONE_SCORE", d.education.no_education_score),
    },
    experience_bands: {
      mid: envNumber(env, "MATCH_BAND_MID_YEARS", d.experience_bands.mid),
      senior: envNumber(env, "MATCH_BAND_SENIOR_YEARS", d.experience_bands.senior),
      lead: envNumber(env, "MATCH_BAND_LEAD_YEARS", d.experience_bands.lead),
    },
  });
}
