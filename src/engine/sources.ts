import { extractProfileV1, type ExtractProfileOptions } from "../../core/extract/assemble"
import { ProfileUnavailableError } from "../../core/domain/errors"
import type { CandidateProfile } from "../../core/domain/profile"

/** Where the batch orchestrator gets a candidate's profile from. */
export interface ProfileSource {
  getProfile(filename: string): Promise<CandidateProfile>
}

/** Profiles already extracted, keyed by filename. */
export function profileSource(profiles: Readonly<Record<string, CandidateProfile>>): ProfileSource {
  const byName = new Map(Object.entries(profiles))
  return {
    async getProfile(filename) {
      const p = byName.get(filename)
      if (!p) throw new ProfileUnavailableError(`PROFILE_NOT_FOUND: ${filename}`)
      return p
    },
  }
}

/** Plain resume texts keyed by filename, extracted on demand. */
export function textSource(
  texts: Readonly<Record<string, string>>,
  opts: Omit<ExtractProfileOptions, "source"> = {}
): ProfileSource {
  const byName = new Map(Object.entries(texts))
  return {
    async getProfile(filename) {
      const text = byName.get(filename)
      if (text == null) throw new ProfileUnavailableError(`PROFILE_NOT_FOUND: ${filename}`)
      if (!text.trim()) throw new ProfileUnavailableError(`PROFILE_EMPTY_TEXT: ${filename}`)
      return extractProfileV1(text, { ...opts, source: filename })
    },
  }
}
