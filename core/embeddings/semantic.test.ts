import { describe, expect, it } from "vitest"

import { ModelUnavailableError } from "../domain/errors"
import type { EmbedInput, EmbedOutput, EmbeddingAdapter } from "./adapter"
import { EmbeddingSemanticSimilarity } from "./semantic"

class FakeAdapter implements EmbeddingAdapter {
  calls: string[] = []
  failNext = 0

  constructor(private vectors: Record<string, number[]>) {}

  async embed(input: EmbedInput): Promise<EmbedOutput> {
    this.calls.push(...input.texts)
    if (this.failNext > 0) {
      this.failNext--
      throw new Error("boom")
    }
    return { vectors: input.texts.map((t) => this.vectors[t] ?? []), modelUsed: "fake" }
  }
}

const vectors = { a: [1, 0], b: [0, 1], c: [1, 1], wide: [1, 0, 0] }

describe("EmbeddingSemanticSimilarity", () => {
  it("returns the cosine of the two embeddings", async () => {
    const sim = new EmbeddingSemanticSimilarity({ adapter: new FakeAdapter(vectors) })
    expect(await sim.similarity("a", "b")).toBe(0)
    expect(await sim.similarity("a", "c")).toBeCloseTo(Math.SQRT1_2, 12)
  })

  it("shares one model call between concurrent requests for the same text", async () => {
    const adapter = new FakeAdapter(vectors)
    const sim = new EmbeddingSemanticSimilarity({ adapter })
    await Promise.all([sim.similarity("a", "b"), sim.similarity("a", "c"), sim.similarity("a", "a")])
    expect(adapter.calls).toEqual(["a", "b", "c"])
  })

  it("evicts the least recently used entry past the bound", async () => {
    const adapter = new FakeAdapter(vectors)
    const sim = new EmbeddingSemanticSimilarity({ adapter, maxCacheEntries: 2 })
    await sim.similarity("a", "b")
    await sim.similarity("a", "c") // a refreshed, b evicted
    expect(sim.cacheSize).toBe(2)
    await sim.similarity("a", "b")
    expect(adapter.calls).toEqual(["a", "b", "c", "b"])
  })

  it("wraps backend failures and retries them on the next call", async () => {
    const adapter = new FakeAdapter(vectors)
    adapter.failNext = 2
    const sim = new EmbeddingSemanticSimilarity({ adapter })

    await expect(sim.similarity("a", "a")).rejects.toThrow("EMBEDDING_FAILED: boom")
    await expect(sim.similarity("a", "a")).rejects.toBeInstanceOf(ModelUnavailableError)
    expect(sim.cacheSize).toBe(0)
    expect(await sim.similarity("a", "a")).toBe(1)
    expect(adapter.calls).toEqual(["a", "a", "a"])
  })

  it("rejects empty and mismatched embeddings", async () => {
    const sim = new EmbeddingSemanticSimilarity({ adapter: new FakeAdapter(vectors) })
    await expect(sim.similarity("a", "missing")).rejects.toThrow("EMBEDDING_EMPTY_OR_INVALID")
    await expect(sim.similarity("a", "wide")).rejects.toThrow("EMBEDDING_DIMENSION_MISMATCH: 2 vs 3")
  })
})
