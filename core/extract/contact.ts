// core/extract/contact.ts
import { sectionOfHeader } from "./sections";

export type ContactInfo = {
  name: string | null;
  email: string | null;
  phone: string | null;
  linkedin: string | null;
  github: string | null;
};

const EMAIL_RE = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const PHONE_RE = /(?<![\d+])(?:\+?\d{1,3}[\s.-]?)?(?:\(\d{2,4}\)|\d{2,4})[\s.-]?\d{3,4}[\s.-]?\d{3,4}(?!\d)/g;
const URL_RE = /(?:https?:\/\/|www\.)\S+|\b[a-z0-9-]+\.(?:com|io|org|net|dev|me)\/\S*/i;
const LINKEDIN_RE = /(?:https?:\/\/)?(?:[a-z]{2,3}\.)?linkedin\.com\/in\/([A-Za-z0-9_-]+)/i;

// github.com/<path> values that are not user accounts
const GITHUB_RESERVED = new Set([
  "topics", "orgs", "organizations", "apps", "marketplace", "features",
  "pricing", "about", "collections", "login", "signup", "settings", "sponsors",
]);

export function extractEmail(text: string): string | null {
  const m = String(text || "").match(EMAIL_RE);
  return m ? m[0] : null;
}

/** First phone-looking run with 10-15 digits; shorter runs are usually dates or ids. */
export function extractPhone(text: string): string | null {
  const t = String(text || "");
  PHONE_RE.lastIndex = 0;
  let m: RegExpExecArray | null = null;
  while ((m = PHONE_RE.exec(t)) !== null) {
    const digits = m[0].replace(/\D/g, "").length;
    if (digits >= 10 && digits <= 15) return m[0].trim();
  }
  return null;
}

export function extractLinkedin(text: string): string | null {
  const m = String(text || "").match(LINKEDIN_RE);
  return m && m[1] ? `linkedin.com/in/${m[1]}` : null;
}

/**
 * GitHub profile from free-form resume text.
 * Kept conservative: URL forms first, then "GitHub: user" labels.
 */
export function extractGithub(text: string): string | null {
  const t = String(text || "");
  if (!t.trim()) return null;

  const urlRe = /github\.com\/([A-Za-z0-9](?:[A-Za-z0-9-]{0,37}[A-Za-z0-9])?)/gi;
  let m: RegExpExecArray | null = null;
  while ((m = urlRe.exec(t)) !== null) {
    const u = (m[1] || "").trim();
    if (!u) continue;
    if (GITHUB_RESERVED.has(u.toLowerCase())) continue;
    return `github.com/${u}`;
  }

  const lm = t.match(/\bgithub\b\s*[:\-]\s*([A-Za-z0-9](?:[A-Za-z0-9-]{0,37}[A-Za-z0-9])?)\b/i);
  if (lm && lm[1]) return `github.com/${lm[1]}`;

  return null;
}

const NAME_WORD = /^[A-Z][A-Za-z.'-]*$/;

/** Name = first of the top five lines that looks like 2-4 capitalized words and nothing else. */
export function extractName(text: string): string | null {
  const lines = String(text || "")
    .split("\n")
    .map((x) => x.trim())
    .filter(Boolean)
    .slice(0, 5);

  for (const line of lines) {
    if (EMAIL_RE.test(line) || URL_RE.test(line)) continue;
    if (extractPhone(line)) continue;
    if (sectionOfHeader(line)) continue;
    if (/\b(resume|résumé|curriculum vitae|cv)\b/i.test(line)) continue;

    const words = line.split(/\s+/);
    if (words.length < 2 || words.length > 4) continue;
    if (words.every((w) => NAME_WORD.test(w))) return line;
  }
  return null;
}

export function extractContactInfo(text: string): ContactInfo {
  return {
    name: extractName(text),
    email: extractEmail(text),
    phone: extractPhone(text),
    linkedin: extractLinkedin(text),
    github: extractGithub(text),
  };
}
