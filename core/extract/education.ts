// core/extract/education.ts
import type { SkillTaxonomy } from "../config/taxonomy";
import type { DegreeMention, EducationLevel, EducationRecord } from "../domain/profile";
import { educationRank, maxEducationLevel } from "../domain/profile";
import { detectSectionRanges, sliceSection } from "./sections";
import { findTermHits, type TermEntry } from "./terms";

// "MS Office", "BS/MS" etc: abbreviations that are not degrees when followed by these
const NOT_A_DEGREE = "(?!\\s+(?:Office|Excel|Word|Access|SQL|Teams|Outlook|PowerPoint|Project|Visio|Dynamics|Azure|Windows|DOS)\\b)";

const DEGREE_PATTERNS: Array<{ level: Exclude<EducationLevel, "none">; re: RegExp }> = [
  { level: "doctorate", re: /(?<![A-Za-z])(?:Ph\.?\s?D\.?|D\.Phil\.?|Ed\.D\.?)(?![A-Za-z])/g },
  { level: "doctorate", re: /\b(?:doctorate|doctoral|doctor of philosophy)\b/gi },

  { level: "masters", re: /\b(?:master'?s\b(?!\s+of\b)|masters?\s+of\b|masters?(?=\s+(?:in|degree)\b))/gi },
  { level: "masters", re: /(?<![A-Za-z])(?:M\.S\.?|M\.Sc\.?|MSc|M\.A\.|M\.Eng\.?|M\.Tech\.?|MBA|M\.B\.A\.)(?![A-Za-z])/g },
  { level: "masters", re: new RegExp(`\\bMS${NOT_A_DEGREE}\\b`, "g") },

  { level: "bachelors", re: /\b(?:bachelor'?s?|bachelor of|baccalaureate)\b/gi },
  { level: "bachelors", re: /(?<![A-Za-z])(?:B\.S\.?|B\.Sc\.?|BSc|B\.A\.|B\.Tech\.?|B\.E\.|B\.Eng\.?|BEng)(?![A-Za-z])/g },
  { level: "bachelors", re: /\b(?:BS|BA)\b(?=\s+(?:in|of)\b|\s*,|\s+[A-Z])/g },

  { level: "associate", re: /\b(?:associate'?s degree|associate degree|associate of (?:arts|science|applied science))\b/gi },
  { level: "associate", re: /(?<![A-Za-z])(?:A\.A\.S\.|A\.S\.|A\.A\.)(?![A-Za-z])/g },

  { level: "high_school", re: /\b(?:high school|secondary school|ged)\b/gi },
];

/** Degree mentions in text order; overlapping matches keep the higher level. */
export function findDegreeMentions(text: string): DegreeMention[] {
  const t = String(text || "");
  const raw: Array<DegreeMention & { start: number; end: number }> = [];

  for (const { level, re } of DEGREE_PATTERNS) {
    re.lastIndex = 0;
    let m: RegExpExecArray | null = null;
    while ((m = re.exec(t)) !== null) {
      if (!m[0]) {
        re.lastIndex++;
        continue;
      }
      raw.push({ text: m[0].trim(), level, start: m.index, end: m.index + m[0].length });
    }
  }

  raw.sort((a, b) => a.start - b.start || educationRank(b.level) - educationRank(a.level) || b.end - a.end);

  const out: Array<DegreeMention & { start: number; end: number }> = [];
  for (const r of raw) {
    const prev = out[out.length - 1];
    if (prev && r.start < prev.end) continue;
    out.push(r);
  }
  return out.map(({ text, level }) => ({ text, level }));
}

export function extractEducation(text: string): EducationRecord {
  const degree_mentions = findDegreeMentions(text);
  const highest_level = maxEducationLevel(degree_mentions.map((d) => d.level));
  return {
    highest_level,
    has_degree: educationRank(highest_level) >= educationRank("bachelors"),
    degree_mentions,
  };
}

/**
 * Known certification names (taxonomy list) in order of first appearance, then any
 * remaining lines of a Certifications section.
 */
export function extractCertifications(text: string, taxonomy: SkillTaxonomy): string[] {
  const entries: TermEntry<string>[] = taxonomy.certifications.map((c) => ({ term: c, value: c }));
  const out: string[] = [];

  for (const hit of findTermHits(text, entries)) {
    if (!out.includes(hit.value)) out.push(hit.value);
  }

  const lines = String(text || "").split("\n").map((x) => x.trim()).filter(Boolean);
  const section = sliceSection(lines, detectSectionRanges(lines), "certifications") ?? [];

  for (const line of section) {
    const lower = line.toLowerCase();
    const covered = out.some((c) => lower.includes(c.toLowerCase()));
    if (!covered && !out.includes(line)) out.push(line);
  }
  return out;
}
