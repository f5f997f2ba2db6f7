// core/extract/sections.ts

export const SECTION_NAMES = [
  "summary",
  "experience",
  "education",
  "skills",
  "certifications",
  "projects",
  "awards",
  "publications",
] as const;
export type SectionName = (typeof SECTION_NAMES)[number];

export type SectionRange = { name: SectionName; start: number; end: number }; // line indexes, end exclusive

const SECTION_HEADERS: Record<SectionName, string[]> = {
  summary: ["summary", "profile", "objective", "about", "about me", "professional summary", "career objective"],
  experience: [
    "experience",
    "work experience",
    "professional experience",
    "work history",
    "employment",
    "employment history",
    "career history",
  ],
  education: ["education", "academic background", "academics", "qualifications", "education and training"],
  skills: ["skills", "technical skills", "core competencies", "expertise", "technical expertise", "key skills"],
  certifications: ["certifications", "certificates", "licenses", "licenses and certifications", "professional certifications"],
  projects: ["projects", "key projects", "notable projects", "personal projects"],
  awards: ["awards", "honors", "achievements", "recognition"],
  publications: ["publications", "papers", "research"],
};

const HEADER_TO_SECTION = new Map<string, SectionName>();
for (const name of SECTION_NAMES) {
  for (const h of SECTION_HEADERS[name]) HEADER_TO_SECTION.set(h, name);
}

export function sectionOfHeader(line: string): SectionName | null {
  const key = String(line || "")
    .trim()
    .replace(/[:\-]+$/, "")
    .replace(/&/g, "and")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
  if (!key || key.length > 40) return null;
  return HEADER_TO_SECTION.get(key) ?? null;
}

/**
 * Splits resume lines into named sections. A section runs from its header to the next header.
 * The first occurrence of a section name wins; later repeats are folded into whatever section is open.
 */
export function detectSectionRanges(lines: string[]): SectionRange[] {
  const headers: Array<{ name: SectionName; line: number }> = [];
  const seen = new Set<SectionName>();

  lines.forEach((line, i) => {
    const name = sectionOfHeader(line);
    if (!name || seen.has(name)) return;
    seen.add(name);
    headers.push({ name, line: i });
  });

  return headers.map((h, i) => ({
    name: h.name,
    start: h.line + 1,
    end: i + 1 < headers.length ? headers[i + 1].line : lines.length,
  }));
}

export function sliceSection(lines: string[], ranges: SectionRange[], name: SectionName): string[] | null {
  const r = ranges.find((x) => x.name === name);
  if (!r) return null;
  return lines.slice(r.start, r.end);
}

/** Every line outside the named section (header included in the exclusion). */
export function linesOutsideSection(lines: string[], ranges: SectionRange[], name: SectionName): string[] {
  const r = ranges.find((x) => x.name === name);
  if (!r) return lines;
  return lines.filter((_, i) => i < r.start - 1 || i >= r.end);
}
