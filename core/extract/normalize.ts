// core/extract/normalize.ts

const ZERO_WIDTH = /[\u200B-\u200D\u2060\uFEFF\u00AD]/g;
const UNICODE_SPACES = /[\u00A0\u1680\u2000-\u200A\u202F\u205F\u3000]/g;
const BULLETS = /[\u2022\u25CF\u25E6\u25AA\u25AB\u25A0\u25A1\u2666\u25C6\u27A2\u27A4\u25BA\u25B6\u2713\u2714\u00B7]/g;

/**
 * Cleans decoded resume text before any recognizer sees it.
 * Keeps line structure (recognizers are line-oriented) and original casing.
 */
export function normalizeResumeText(raw: string): string {
  const t = String(raw || "");
  if (!t.trim()) return "";

  const cleaned = t
    .normalize("NFKC")
    .replace(/\r\n?/g, "\n")
    .replace(ZERO_WIDTH, "")
    .replace(UNICODE_SPACES, " ")
    .replace(/[\u2018\u2019\u201A\u201B]/g, "'")
    .replace(/[\u201C\u201D\u201E\u201F]/g, '"')
    .replace(/[\u2010-\u2015\u2212]/g, "-")
    .replace(BULLETS, " ")
    .replace(/\t/g, " ");

  return cleaned
    .split("\n")
    .map((line) => line.replace(/ {2,}/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

/** Lowercased word tokens (2+ chars) for lexical similarity. */
export function tokenize(text: string): string[] {
  const m = String(text || "").toLowerCase().match(/[a-z0-9][a-z0-9+#]*/g);
  return (m || []).filter((tok) => tok.length >= 2);
}
