// core/embeddings/semantic.ts
import { cosineSimilarity } from "../domain/similarity"
import { ModelUnavailableError, errorMessageOf } from "../domain/errors"
import type { EmbeddingAdapter, SemanticSimilarity } from "./adapter"

export const DEFAULT_EMBEDDING_CACHE_SIZE = 512

/**
 * SemanticSimilarity over an EmbeddingAdapter.
 * The cache holds promises, so concurrent scorers asking for the same text share one call.
 * Failed lookups are evicted and retried on the next request.
 */
export class EmbeddingSemanticSimilarity implements SemanticSimilarity {
  private adapter: EmbeddingAdapter
  private maxEntries: number
  private cache = new Map<string, Promise<number[]>>()

  constructor(opts: { adapter: EmbeddingAdapter; maxCacheEntries?: number }) {
    this.adapter = opts.adapter
    this.maxEntries = Math.max(1, opts.maxCacheEntries ?? DEFAULT_EMBEDDING_CACHE_SIZE)
  }

  get cacheSize(): number {
    return this.cache.size
  }

  async similarity(a: string, b: string): Promise<number> {
    const [va, vb] = await Promise.all([this.embedding(a), this.embedding(b)])
    if (va.length !== vb.length) {
      throw new ModelUnavailableError(`EMBEDDING_DIMENSION_MISMATCH: ${va.length} vs ${vb.length}`)
    }
    return cosineSimilarity(va, vb)
  }

  private embedding(text: string): Promise<number[]> {
    const hit = this.cache.get(text)
    if (hit) {
      // refresh recency
      this.cache.delete(text)
      this.cache.set(text, hit)
      return hit
    }

    const pending = this.fetchOne(text)
    this.cache.set(text, pending)
    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next()
      if (oldest.done) break
      this.cache.delete(oldest.value)
    }

    pending.catch(() => {
      if (this.cache.get(text) === pending) this.cache.delete(text)
    })
    return pending
  }

  private async fetchOne(text: string): Promise<number[]> {
    let vectors: number[][]
    try {
      vectors = (await this.adapter.embed({ texts: [text] })).vectors
    } catch (e) {
      if (e instanceof ModelUnavailableError) throw e
      throw new ModelUnavailableError(`EMBEDDING_FAILED: ${errorMessageOf(e)}`, e)
    }

    const v = vectors[0]
    if (!Array.isArray(v) || v.length === 0 || !v.every((x) => Number.isFinite(x))) {
      throw new ModelUnavailableError("EMBEDDING_EMPTY_OR_INVALID")
    }
    return v
  }
}
