import { describe, expect, it } from "vitest";

import { InvalidConfigurationError } from "../domain/errors";
import { defaultScoringConfigV1, loadScoringConfigFromEnv, parseExperienceBands, parseScoringConfig } from "./scoring";

function withWeights(w: Partial<ReturnType<typeof defaultScoringConfigV1>["weights"]>) {
  const cfg = defaultScoringConfigV1();
  return { ...cfg, weights: { ...cfg.weights, ...w } };
}

describe("parseScoringConfig", () => {
  it("accepts the defaults", () => {
    expect(parseScoringConfig(defaultScoringConfigV1())).toEqual(defaultScoringConfigV1());
  });

  it("rejects weights that do not sum to 1", () => {
    expect(() => parseScoringConfig(withWeights({ semantic_similarity_weight: 0 }))).toThrow(InvalidConfigurationError);
    expect(() => parseScoringConfig(withWeights({ semantic_similarity_weight: 0.2 }))).toThrow(
      /weights must sum to 1.0/
    );
  });

  it("tolerates rounding within 1e-6", () => {
    expect(() => parseScoringConfig(withWeights({ semantic_similarity_weight: 0.1000004 }))).not.toThrow();
  });

  it("rejects negative weights", () => {
    expect(() => parseScoringConfig(withWeights({ skill_weight: -0.1, semantic_similarity_weight: 0.6 }))).toThrow(
      InvalidConfigurationError
    );
  });

  it("rejects unordered fit thresholds", () => {
    const cfg = { ...defaultScoringConfigV1(), fit_thresholds: { excellent: 70, good: 85, fair: 50 } };
    expect(() => parseScoringConfig(cfg)).toThrow(/excellent > good > fair/);
  });

  it("rejects unknown keys", () => {
    expect(() => parseScoringConfig({ ...defaultScoringConfigV1(), extra: 1 })).toThrow(InvalidConfigurationError);
  });
});

describe("parseExperienceBands", () => {
  it("requires ascending bands", () => {
    expect(parseExperienceBands({ mid: 1, senior: 4, lead: 9 })).toEqual({ mid: 1, senior: 4, lead: 9 });
    expect(() => parseExperienceBands({ mid: 5, senior: 5, lead: 9 })).toThrow(InvalidConfigurationError);
  });
});

describe("loadScoringConfigFromEnv", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadScoringConfigFromEnv({})).toEqual(defaultScoringConfigV1());
  });

  it("overrides values from MATCH_* variables", () => {
    const cfg = loadScoringConfigFromEnv({
      MATCH_SKILL_WEIGHT: "0.5",
      MATCH_SEMANTIC_SIMILARITY_WEIGHT: "0",
      MATCH_FIT_EXCELLENT: "90",
      MATCH_EDUCATION_PARTIAL_SCORE: "40",
    });
    expect(cfg.weights.skill_weight).toBe(0.5);
    expect(cfg.weights.semantic_similarity_weight).toBe(0);
    expect(cfg.fit_thresholds.excellent).toBe(90);
    expect(cfg.education.partial_score).toBe(40);
  });

  it("rejects values that are not numbers", () => {
    expect(() => loadScoringConfigFromEnv({ MATCH_FIT_GOOD: "abc" })).toThrow("ENV_NOT_A_NUMBER: MATCH_FIT_GOOD=abc");
  });

  it("validates the merged result", () => {
    expect(() => loadScoringConfigFromEnv({ MATCH_SKILL_WEIGHT: "0.9" })).toThrow(InvalidConfigurationError);
  });
});
