import { describe, expect, it } from "vitest";

import { cosineSimilarity, englishStopwords, termsOf, tfidfCosineSimilarity } from "./similarity";

describe("termsOf", () => {
  it("drops stop words and adds adjacent bigrams", () => {
    expect(termsOf("The senior Python developers")).toEqual([
      "senior",
      "python",
      "developers",
      "senior python",
      "python developers",
    ]);
  });

  it("loads the bundled stop word list", () => {
    expect(englishStopwords().has("the")).toBe(true);
    expect(englishStopwords().has("python")).toBe(false);
  });
});

describe("tfidfCosineSimilarity", () => {
  it("is 1 for identical documents", () => {
    expect(tfidfCosineSimilarity("python django developer", "python django developer")).toBeCloseTo(1, 10);
  });

  it("is 0 for documents without shared terms", () => {
    expect(tfidfCosineSimilarity("python developer", "marketing manager")).toBe(0);
  });

  it("is 0 when either side has no terms", () => {
    expect(tfidfCosineSimilarity("", "python")).toBe(0);
    expect(tfidfCosineSimilarity("the and of", "the and of")).toBe(0);
  });

  it("ranks larger overlap higher", () => {
    const job = "python django aws";
    const close = tfidfCosineSimilarity(job, "python django aws docker");
    const far = tfidfCosineSimilarity(job, "python java");
    expect(close).toBeGreaterThan(far);
    expect(far).toBeGreaterThan(0);
    expect(close).toBeLessThan(1);
  });

  it("is symmetric", () => {
    const a = "backend python services";
    const b = "python backend engineer";
    expect(tfidfCosineSimilarity(a, b)).toBeCloseTo(tfidfCosineSimilarity(b, a), 12);
  });
});

describe("cosineSimilarity", () => {
  it("handles parallel, orthogonal and opposite vectors", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 12);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it("returns 0 for empty, zero or mismatched vectors", () => {
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1], [1, 2])).toBe(0);
  });
});
