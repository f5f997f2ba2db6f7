// Usage: npm run example -- [resumeDir] [job.json]
// Set OPENAI_API_KEY to include semantic similarity; without it the weight is redistributed.
import { readFileSync, readdirSync } from "node:fs"
import { join } from "node:path"
import { fileURLToPath } from "node:url"

import {
  EmbeddingSemanticSimilarity,
  MatchScorer,
  OpenAIEmbeddingAdapter,
  defaultSkillTaxonomy,
  jsonConsoleLogger,
  loadScoringConfigFromEnv,
  scoreBatchV1,
  textSource,
} from "../src/index"

const here = fileURLToPath(new URL(".", import.meta.url))
const resumeDir = process.argv[2] || join(here, "resumes")
const jobPath = process.argv[3] || join(here, "job.json")

async function main() {
  const texts: Record<string, string> = {}
  for (const f of readdirSync(resumeDir).filter((x) => x.endsWith(".txt")).sort()) {
    texts[f] = readFileSync(join(resumeDir, f), "utf8")
  }

  const job: unknown = JSON.parse(readFileSync(jobPath, "utf8"))
  const taxonomy = defaultSkillTaxonomy()

  const semantic = process.env.OPENAI_API_KEY
    ? new EmbeddingSemanticSimilarity({
        adapter: OpenAIEmbeddingAdapter.fromEnv(process.env, { logger: jsonConsoleLogger }),
      })
    : null

  const scorer = new MatchScorer({
    config: loadScoringConfigFromEnv(process.env),
    semantic,
    taxonomy,
    logger: jsonConsoleLogger,
  })

  const out = await scoreBatchV1({
    filenames: Object.keys(texts),
    job,
    source: textSource(texts, { taxonomy }),
    scorer,
    timeoutMs: 60_000,
  })

  for (const [i, m] of out.matches.entries()) {
    console.log(
      `${i + 1}. ${m.candidate_name ?? "(no name)"} [${m.filename}] ${m.overall_score} ${m.fit_level} :: ${m.recommendations.join(" | ")}`
    )
  }
  for (const f of out.failed) console.log(`FAILED ${f.filename}: ${f.code} ${f.error}`)
}

main().catch((e: unknown) => {
  console.error(e)
  process.exitCode = 1
})
