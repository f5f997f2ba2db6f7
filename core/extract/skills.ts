// core/extract/skills.ts
import Fuse from "fuse.js";

import type { SkillTaxonomy } from "../config/taxonomy";
import type { FuzzySkillMatch, SkillInventory } from "../domain/profile";
import { detectSectionRanges, type SectionRange } from "./sections";
import { findTermHits, maskLinks, type TermEntry } from "./terms";

export type ExtractSkillsOptions = {
  /** Also look for near-miss spellings ("Kubernets"). Default true. */
  fuzzy?: boolean;
  /** Treat the whole text as a skills list, so ambiguous terms need no list context. */
  asSkillsList?: boolean;
};

// Fuse score is edits / pattern length; 0.15 is one edit in seven characters
export const FUZZY_MAX_SCORE = 0.15;
const FUZZY_MIN_LENGTH = 6;
const WORD = /[A-Za-z][A-Za-z0-9+#]*(?:[.\-][A-Za-z0-9+#]+)*/g;

const LIST_BEFORE = /(?:^[ \t]*[-*]?|[,;:/|(&]|\b(?:and|or))[ \t]*$/i;
const LIST_AFTER = /^[ \t]*(?:\.?[ \t]*$|[,;/|)&]|(?:and|or)\b)/i;

export function compareSkillNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Item in a list: a separator or line edge on both sides ("Skills: Go, R" but not "ready to go"). */
export function inListContext(text: string, start: number, end: number): boolean {
  const lineStart = text.lastIndexOf("\n", start - 1) + 1;
  const nl = text.indexOf("\n", end);
  const lineEnd = nl < 0 ? text.length : nl;
  return LIST_BEFORE.test(text.slice(lineStart, start)) && LIST_AFTER.test(text.slice(end, lineEnd));
}

function lineOffsets(lines: string[]): number[] {
  const out: number[] = [];
  let at = 0;
  for (const line of lines) {
    out.push(at);
    at += line.length + 1;
  }
  out.push(at);
  return out;
}

function sectionSpan(offsets: number[], r: SectionRange): [number, number] {
  return [offsets[r.start], offsets[r.end] - 1];
}

type FuzzyIndex = { fuse: Fuse<string>; entries: TermEntry<string>[] };

const fuzzyIndexes = new WeakMap<SkillTaxonomy, FuzzyIndex>();

function fuzzyIndexFor(taxonomy: SkillTaxonomy): FuzzyIndex {
  const cached = fuzzyIndexes.get(taxonomy);
  if (cached) return cached;

  // ambiguous and very short terms would turn ordinary words into skills
  const entries = taxonomy.terms.filter(
    (e) => e.term.length >= FUZZY_MIN_LENGTH - 1 && !taxonomy.ambiguous.has(e.term.toLowerCase())
  );
  const index: FuzzyIndex = {
    entries,
    fuse: new Fuse(
      entries.map((e) => e.term),
      { includeScore: true, threshold: FUZZY_MAX_SCORE, ignoreLocation: true, ignoreFieldNorm: true }
    ),
  };
  fuzzyIndexes.set(taxonomy, index);
  return index;
}

type Word = { text: string; start: number; end: number };

function fuzzyCandidates(text: string, claimed: Array<[number, number]>): Word[] {
  const free = (w: Word) => !claimed.some(([s, e]) => w.start < e && s < w.end);
  const words: Word[] = [];
  for (const m of text.matchAll(WORD)) {
    const start = m.index ?? 0;
    words.push({ text: m[0], start, end: start + m[0].length });
  }

  const out: Word[] = [];
  words.forEach((w, i) => {
    if (!free(w)) return;
    if (w.text.length >= FUZZY_MIN_LENGTH) out.push(w);
    const next = words[i + 1];
    if (next && free(next) && /^[ \t]$/.test(text.slice(w.end, next.start))) {
      out.push({ text: `${w.text} ${next.text}`, start: w.start, end: next.end });
    }
  });
  return out.filter((w) => w.text.length >= FUZZY_MIN_LENGTH);
}

/**
 * Near-miss spellings of taxonomy terms among words not already matched exactly.
 * Candidate and term lengths may differ by one character at most.
 */
export function findFuzzySkills(
  text: string,
  taxonomy: SkillTaxonomy,
  claimed: Array<[number, number]>,
  exact: ReadonlySet<string>
): FuzzySkillMatch[] {
  const { fuse, entries } = fuzzyIndexFor(taxonomy);
  const out: FuzzySkillMatch[] = [];

  for (const cand of fuzzyCandidates(text, claimed)) {
    // an exact spelling of a term is the exact recognizer's call, including a rejected ambiguous one
    if (taxonomy.canonicalByKey.has(cand.text.toLowerCase())) continue;

    const best = fuse
      .search(cand.text)
      .find((r) => Math.abs(r.item.length - cand.text.length) <= 1 && (r.score ?? 1) <= FUZZY_MAX_SCORE);
    if (!best) continue;

    const skill = entries[best.refIndex].value;
    if (exact.has(skill) || out.some((f) => f.skill === skill)) continue;
    out.push({ skill, text: cand.text, similarity: Math.round((1 - (best.score ?? 1)) * 10000) / 100 });
  }
  return out;
}

/**
 * Taxonomy-driven skill inventory. Emails and URLs are masked first so that
 * "github.com/jdoe" does not count as a GitHub mention. Ambiguous terms count
 * inside a Skills section or where they stand as a list item.
 */
export function extractSkills(text: string, taxonomy: SkillTaxonomy, opts: ExtractSkillsOptions = {}): SkillInventory {
  const masked = maskLinks(text);

  let skillsSpan: [number, number] | null = null;
  if (!opts.asSkillsList) {
    const lines = masked.split("\n");
    const r = detectSectionRanges(lines).find((x) => x.name === "skills");
    if (r) skillsSpan = sectionSpan(lineOffsets(lines), r);
  }

  const accept = (entry: TermEntry<string>, start: number, end: number) => {
    if (opts.asSkillsList || !taxonomy.ambiguous.has(entry.term.toLowerCase())) return true;
    if (skillsSpan && start >= skillsSpan[0] && end <= skillsSpan[1]) return true;
    return inListContext(masked, start, end);
  };

  const hits = findTermHits(masked, taxonomy.terms, accept);

  const counts = new Map<string, number>();
  for (const h of hits) counts.set(h.value, (counts.get(h.value) || 0) + 1);

  const fuzzy_matches =
    opts.fuzzy === false
      ? []
      : findFuzzySkills(
          masked,
          taxonomy,
          hits.map((h): [number, number] => [h.start, h.end]),
          new Set(counts.keys())
        );

  const found = new Set([...counts.keys(), ...fuzzy_matches.map((f) => f.skill)]);
  const skills = [...found].sort(compareSkillNames);

  const categories: Record<string, string[]> = {};
  for (const category of taxonomy.categoryOrder) {
    const inCategory = (taxonomy.categories[category] || []).filter((s) => found.has(s));
    if (inCategory.length) categories[category] = inCategory;
  }

  const mention_count: Record<string, number> = {};
  for (const s of skills) {
    const n = counts.get(s);
    if (n) mention_count[s] = n;
  }

  return {
    skills,
    total_skills: skills.length,
    categories,
    mention_count,
    fuzzy_matches,
  };
}

/** Exact skills named in each detected section, in section order; sections naming none are left out. */
export function extractSectionSkills(text: string, taxonomy: SkillTaxonomy): Record<string, string[]> {
  const lines = String(text || "").split("\n");
  const out: Record<string, string[]> = {};

  for (const r of detectSectionRanges(lines)) {
    const body = lines.slice(r.start, r.end).join("\n");
    if (!body.trim()) continue;
    const { skills } = extractSkills(body, taxonomy, { fuzzy: false, asSkillsList: r.name === "skills" });
    if (skills.length) out[r.name] = [...skills];
  }
  return out;
}
