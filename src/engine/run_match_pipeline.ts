import { parseJobDescription } from "../../core/domain/job"
import { errorCodeOf, errorMessageOf } from "../../core/domain/errors"
import type { MatchResult, MatchScorer } from "../../core/domain/scoring"
import { jsonConsoleLogger, type Logger } from "../lib/log"
import { round2 } from "../lib/utils"
import type { ProfileSource } from "./sources"

export const DEFAULT_BATCH_CONCURRENCY = 4

export type BatchFailure = {
  filename: string
  error: string
  code: string
}

export type BatchResult = {
  job_title: string
  total_candidates: number // successful matches only
  matches: MatchResult[]
  failed: BatchFailure[] // input order
  timed_out: boolean
  processing_time: number // seconds
}

export type ScoreBatchArgs = {
  filenames: string[]
  job: unknown
  source: ProfileSource
  scorer: Pick<MatchScorer, "score">
  concurrency?: number
  timeoutMs?: number
  logger?: Logger
}

type Outcome = { ok: true; match: MatchResult } | { ok: false; failure: BatchFailure }

function compareNames(a: string | null, b: string | null): number {
  if (a === b) return 0
  if (a === null) return 1 // nameless last
  if (b === null) return -1
  return a < b ? -1 : 1
}

export function compareMatches(a: MatchResult, b: MatchResult): number {
  if (a.overall_score !== b.overall_score) return b.overall_score - a.overall_score
  const byName = compareNames(a.candidate_name, b.candidate_name)
  if (byName !== 0) return byName
  return a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0
}

/**
 * Scores every candidate against one job and ranks them.
 * Per-candidate failures are reported in `failed`; only an invalid job rejects the whole batch.
 */
export async function scoreBatchV1(args: ScoreBatchArgs): Promise<BatchResult> {
  const { source, scorer } = args
  const logger = args.logger ?? jsonConsoleLogger
  const started = Date.now()

  // validated once for the whole request
  const job = parseJobDescription(args.job)
  const filenames = [...new Set(args.filenames)]
  const concurrency = Math.max(1, Math.floor(args.concurrency ?? DEFAULT_BATCH_CONCURRENCY))

  logger.info("batch_start", { jobTitle: job.title, candidates: filenames.length, concurrency })

  const outcomes: Array<Outcome | undefined> = new Array(filenames.length).fill(undefined)
  let next = 0
  let stopped = false

  const runOne = async (filename: string): Promise<Outcome> => {
    try {
      const profile = await source.getProfile(filename)
      return { ok: true, match: await scorer.score(profile, job) }
    } catch (e) {
      const failure = { filename, error: errorMessageOf(e), code: errorCodeOf(e) }
      logger.warn("batch_candidate_failed", { ...failure })
      return { ok: false, failure }
    }
  }

  const worker = async () => {
    while (!stopped && next < filenames.length) {
      const i = next++
      outcomes[i] = await runOne(filenames[i])
    }
  }

  const workers = Promise.all(Array.from({ length: Math.min(concurrency, filenames.length) }, () => worker()))

  let timedOut = false
  const timeoutMs = args.timeoutMs
  if (timeoutMs != null && timeoutMs >= 0) {
    let timer: ReturnType<typeof setTimeout> | undefined
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs)
    })
    const first = await Promise.race([workers.then(() => "done" as const), deadline])
    clearTimeout(timer)
    if (first === "timeout") {
      timedOut = true
      stopped = true
    }
  } else {
    await workers
  }

  // snapshot: anything still running after the deadline is reported as timed out
  const snapshot = [...outcomes]
  const matches: MatchResult[] = []
  const failed: BatchFailure[] = []

  snapshot.forEach((o, i) => {
    if (!o) {
      failed.push({ filename: filenames[i], error: "candidate not scored before the batch deadline", code: "BATCH_TIMEOUT" })
    } else if (o.ok) {
      matches.push(o.match)
    } else {
      failed.push(o.failure)
    }
  })

  matches.sort(compareMatches)

  if (timedOut) {
    logger.warn("batch_timeout", {
      jobTitle: job.title,
      completed: snapshot.filter(Boolean).length,
      unfinished: snapshot.filter((o) => !o).length,
    })
  }

  const processing_time = round2((Date.now() - started) / 1000)
  logger.info("batch_done", {
    jobTitle: job.title,
    matched: matches.length,
    failed: failed.length,
    timedOut,
    processingTime: processing_time,
  })

  return {
    job_title: job.title,
    total_candidates: matches.length,
    matches,
    failed,
    timed_out: timedOut,
    processing_time,
  }
}
