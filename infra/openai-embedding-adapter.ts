import { z } from "zod"

import type { EmbedInput, EmbedOutput, EmbeddingAdapter, EmbeddingModel } from "../core/embeddings/adapter"
import { InvalidConfigurationError, ModelUnavailableError, errorMessageOf } from "../core/domain/errors"
import { jitter, sleep } from "../src/lib/utils"
import { silentLogger, type Logger } from "../src/lib/log"

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface OpenAIEmbeddingAdapterOptions {
  apiKey: string
  baseUrl?: string
  model?: EmbeddingModel
  timeoutMs?: number
  maxAttempts?: number
  fetchImpl?: FetchLike
  sleepImpl?: (ms: number) => Promise<void>
  logger?: Logger
}

const embeddingsResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int().min(0), embedding: z.array(z.number()) })),
  model: z.string().optional(),
  usage: z.object({ prompt_tokens: z.number().optional(), total_tokens: z.number().optional() }).optional(),
})

function isRetryableStatus(status: number) {
  return status === 429 || status === 408 || (status >= 500 && status <= 599)
}

function isNetworkError(e: unknown): boolean {
  const msg = e instanceof Error ? e.message : ""
  return (
    msg.includes("fetch failed") ||
    msg.includes("ECONNRESET") ||
    msg.includes("ENOTFOUND") ||
    msg.includes("ETIMEDOUT")
  )
}

function isAbortError(e: unknown): boolean {
  return e instanceof Error && e.name === "AbortError"
}

function parseOpenAIErrorMessage(bodyText: string): string | null {
  const parsed = z
    .object({ error: z.object({ message: z.string() }) })
    .safeParse(safeJson(bodyText))
  return parsed.success ? parsed.data.error.message : null
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

export class OpenAIEmbeddingAdapter implements EmbeddingAdapter {
  private apiKey: string
  private baseUrl: string
  private model: EmbeddingModel
  private timeoutMs: number
  private maxAttempts: number
  private fetchImpl: FetchLike
  private sleepImpl: (ms: number) => Promise<void>
  private logger: Logger

  constructor(opts: OpenAIEmbeddingAdapterOptions) {
    if (!opts.apiKey) throw new InvalidConfigurationError("OPENAI_API_KEY_MISSING")
    this.apiKey = opts.apiKey
    this.baseUrl = opts.baseUrl ?? "https://api.openai.com/v1"
    this.model = opts.model ?? "text-embedding-3-small"
    this.timeoutMs = opts.timeoutMs ?? 25000
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3)
    this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, init))
    this.sleepImpl = opts.sleepImpl ?? sleep
    this.logger = opts.logger ?? silentLogger
  }

  static fromEnv(env: Record<string, string | undefined> = process.env, extra: Partial<OpenAIEmbeddingAdapterOptions> = {}) {
    return new OpenAIEmbeddingAdapter({
      apiKey: env.OPENAI_API_KEY || "",
      model: env.OPENAI_EMBEDDING_MODEL || undefined,
      timeoutMs: Number(env.OPENAI_TIMEOUT_MS || 25000),
      maxAttempts: Number(env.OPENAI_MAX_ATTEMPTS || 3),
      ...extra,
    })
  }

  async embed(input: EmbedInput): Promise<EmbedOutput> {
    const started = Date.now()
    if (!input.texts.length) return { vectors: [], modelUsed: this.model, latencyMs: 0 }

    const body = await this.callEmbeddings({ model: this.model, input: input.texts })
    const parsed = embeddingsResponseSchema.safeParse(body)
    if (!parsed.success || parsed.data.data.length !== input.texts.length) {
      throw new ModelUnavailableError("OPENAI_BAD_EMBEDDING_RESPONSE", parsed.success ? null : parsed.error.issues)
    }

    const vectors = [...parsed.data.data].sort((a, b) => a.index - b.index).map((d) => d.embedding)
    const usage = parsed.data.usage

    return {
      vectors,
      modelUsed: parsed.data.model ?? this.model,
      usage: usage ? { inputTokens: usage.prompt_tokens, totalTokens: usage.total_tokens } : undefined,
      latencyMs: Date.now() - started,
    }
  }

  private async backoff(attempt: number, reason: string) {
    // exponential backoff: 500ms, 1000ms, 2000ms (+ jitter)
    const ms = jitter(500 * Math.pow(2, attempt - 1))
    this.logger.warn("embedding_retry", { attempt, reason, backoffMs: ms })
    await this.sleepImpl(ms)
  }

  private async callEmbeddings(body: unknown): Promise<unknown> {
    let lastErr: unknown = null

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const controller = new AbortController()
      const t = setTimeout(() => controller.abort(), this.timeoutMs)

      try {
        const res = await this.fetchImpl(`${this.baseUrl}/embeddings`, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        })

        const text = await res.text()

        if (!res.ok) {
          const msg = parseOpenAIErrorMessage(text)
          const errStr = `OPENAI_ERROR_${res.status}: ${(msg ?? text).slice(0, 400)}`

          if (isRetryableStatus(res.status) && attempt < this.maxAttempts) {
            await this.backoff(attempt, `status_${res.status}`)
            continue
          }
          throw new ModelUnavailableError(errStr, { status: res.status })
        }

        const json = safeJson(text)
        if (json === undefined) throw new ModelUnavailableError("OPENAI_NON_JSON_RESPONSE")
        return json
      } catch (e) {
        if (e instanceof ModelUnavailableError) throw e
        lastErr = e

        const isAbort = isAbortError(e)

        // timeouts and transient network errors get another attempt
        if ((isAbort || isNetworkError(e)) && attempt < this.maxAttempts) {
          await this.backoff(attempt, isAbort ? "timeout" : "network")
          continue
        }

        if (isAbort) throw new ModelUnavailableError("OPENAI_TIMEOUT")
        throw new ModelUnavailableError(`OPENAI_REQUEST_FAILED: ${errorMessageOf(e)}`, e)
      } finally {
        clearTimeout(t)
      }
    }

    throw new ModelUnavailableError("OPENAI_UNKNOWN_ERROR", lastErr)
  }
}
