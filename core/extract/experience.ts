// core/extract/experience.ts
import type { ExperienceBands } from "../config/scoring";
import type { ExperienceLevel, YearsExperienceSource } from "../domain/profile";
import { detectSectionRanges, linesOutsideSection, sliceSection } from "./sections";

export type YearsOfExperience = {
  years: number;
  source: YearsExperienceSource;
};

export type DatePoint = {
  year: number;
  month: number; // 1..12
  precision: "year" | "month";
};

export type DateRange = {
  raw: string;
  start: DatePoint;
  end: DatePoint | "present";
};

const MAX_YEARS = 50;
const MIN_YEAR = 1950;

// -------------------- explicit statements --------------------

const STATED_PATTERNS: RegExp[] = [
  // "5 years of experience", "5+ yrs experience", "5-7 years of professional experience"
  /(?<![\d.])(\d{1,2}(?:\.\d+)?)\s*\+?\s*(?:-\s*\d{1,2}\s*)?(?:years?|yrs?)\.?\s+(?:of\s+)?(?:[a-z-]+\s+){0,3}?experience\b/gi,
  // "Experience: 7 years", "experience of 7+ years"
  /\bexperience\s*(?:of|:)?\s*(\d{1,2}(?:\.\d+)?)\s*\+?\s*(?:years?|yrs?)\b/gi,
];

/** Largest explicitly stated number of years, or null when the text never states one. */
export function extractStatedYears(text: string): number | null {
  const t = String(text || "");
  let best: number | null = null;

  for (const re of STATED_PATTERNS) {
    re.lastIndex = 0;
    let m: RegExpExecArray | null = null;
    while ((m = re.exec(t)) !== null) {
      const n = Number(m[1]);
      if (!Number.isFinite(n) || n < 0 || n > MAX_YEARS) continue;
      if (best === null || n > best) best = n;
    }
  }
  return best;
}

// -------------------- date ranges --------------------

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const MONTH_SRC =
  "jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?";
const YEAR_SRC = "(?:19|20)\\d{2}(?!\\d)";
const DATE_SRC =
  `(?:(?:${MONTH_SRC})\\.?,?\\s+${YEAR_SRC}` +
  `|(?:0?[1-9]|1[0-2])\\/${YEAR_SRC}` +
  `|${YEAR_SRC}(?:[\\/.-](?:0?[1-9]|1[0-2])(?!\\d))?)`;
const PRESENT_SRC = "present|current|now|today|date";

const RANGE_RE = new RegExp(
  `(?<![\\w/])(${DATE_SRC})\\s*(?:-|to|until|through)\\s*(${DATE_SRC}|${PRESENT_SRC})\\b`,
  "gi"
);

export function parseDatePoint(raw: string): DatePoint | null {
  const t = String(raw || "").trim().toLowerCase();

  const named = t.match(new RegExp(`^(${MONTH_SRC})\\.?,?\\s+(\\d{4})$`));
  if (named) {
    return { year: Number(named[2]), month: MONTHS[named[1].slice(0, 3)] ?? 1, precision: "month" };
  }

  const slashed = t.match(/^(\d{1,2})\/(\d{4})$/);
  if (slashed) return { year: Number(slashed[2]), month: Number(slashed[1]), precision: "month" };

  const isoish = t.match(/^(\d{4})[\/.-](\d{1,2})$/);
  if (isoish) return { year: Number(isoish[1]), month: Number(isoish[2]), precision: "month" };

  const yearOnly = t.match(/^(\d{4})$/);
  if (yearOnly) return { year: Number(yearOnly[1]), month: 1, precision: "year" };

  return null;
}

export function findDateRanges(text: string): DateRange[] {
  const t = String(text || "");
  const out: DateRange[] = [];

  RANGE_RE.lastIndex = 0;
  let m: RegExpExecArray | null = null;
  while ((m = RANGE_RE.exec(t)) !== null) {
    const start = parseDatePoint(m[1]);
    if (!start) continue;

    const endRaw = m[2].trim().toLowerCase();
    const end = new RegExp(`^(?:${PRESENT_SRC})$`).test(endRaw) ? "present" : parseDatePoint(endRaw);
    if (!end) continue;

    out.push({ raw: m[0], start, end });
  }
  return out;
}

function monthIndex(p: DatePoint): number {
  return p.year * 12 + (p.month - 1);
}

/**
 * Years between the earliest start and the latest end across all ranges.
 * Year-only dates count as January. Implausible ranges are skipped.
 */
export function yearsFromDateRanges(ranges: DateRange[], now: Date): number | null {
  const nowIdx = now.getUTCFullYear() * 12 + now.getUTCMonth();

  let earliest = Infinity;
  let latest = -Infinity;

  for (const r of ranges) {
    const s = monthIndex(r.start);
    const e = r.end === "present" ? nowIdx : monthIndex(r.end);

    if (r.start.year < MIN_YEAR) continue;
    if (s > nowIdx) continue;
    if (e < s) continue;
    if ((e - s) / 12 > MAX_YEARS) continue;

    earliest = Math.min(earliest, s);
    latest = Math.max(latest, Math.min(e, nowIdx));
  }

  if (!Number.isFinite(earliest) || !Number.isFinite(latest)) return null;
  return Math.round(((latest - earliest) / 12) * 10) / 10;
}

// -------------------- public --------------------

/**
 * Explicit statements win; otherwise the date-range span of the work-history lines.
 * Work-history = the experience section, or everything but the education section when
 * the resume has no experience header.
 */
export function extractYearsOfExperience(text: string, now: Date): YearsOfExperience {
  const stated = extractStatedYears(text);
  if (stated !== null) return { years: stated, source: "stated" };

  const lines = String(text || "").split("\n").map((x) => x.trim()).filter(Boolean);
  const ranges = detectSectionRanges(lines);
  const workLines = sliceSection(lines, ranges, "experience") ?? linesOutsideSection(lines, ranges, "education");

  const fromDates = yearsFromDateRanges(findDateRanges(workLines.join("\n")), now);
  if (fromDates !== null) return { years: fromDates, source: "date_range" };

  return { years: 0, source: "none" };
}

/** Inclusive lower bounds: a value sitting on a threshold takes the higher band. */
export function experienceLevelFor(years: number, bands: ExperienceBands): ExperienceLevel {
  const y = Number.isFinite(years) ? years : 0;
  if (y >= bands.lead) return "lead";
  if (y >= bands.senior) return "senior";
  if (y >= bands.mid) return "mid";
  return "entry";
}
