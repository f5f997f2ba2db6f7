// core/embeddings/adapter.ts

export type EmbeddingModel = "text-embedding-3-small" | "text-embedding-3-large" | (string & {})

export interface EmbeddingUsage {
  inputTokens?: number
  totalTokens?: number
}

export interface EmbedInput {
  texts: string[]
}

export interface EmbedOutput {
  vectors: number[][] // same order as input.texts
  modelUsed: EmbeddingModel
  usage?: EmbeddingUsage
  latencyMs?: number
}

/** A text -> vector backend. Implementations throw ModelUnavailableError when they cannot answer. */
export interface EmbeddingAdapter {
  embed(input: EmbedInput): Promise<EmbedOutput>
}

/** Cosine similarity of two texts in [-1, 1]. */
export interface SemanticSimilarity {
  similarity(a: string, b: string): Promise<number>
}
