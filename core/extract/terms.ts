// core/extract/terms.ts
// Boundary-aware dictionary matching shared by the skill, education and certification recognizers.

export type TermEntry<T> = { term: string; value: T };

export type TermHit<T> = {
  value: T;
  term: string;
  text: string; // matched text as written
  start: number;
  end: number;
};

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// "R&D", "Go-to": a one- or two-character term glued to another word by & ' or - is part of that word
const SHORT_TERM = /^[A-Za-z0-9]{1,2}$/;
const GLUED_BEFORE = "(?<![A-Za-z0-9][&'\\-])";
const GLUED_AFTER = "(?![&'\\-][A-Za-z0-9])";

/** Case-insensitive, and never inside a longer alphanumeric run. */
export function termRegExp(term: string): RegExp {
  const t = term.trim();
  const body = escapeRegExp(t).replace(/\s+/g, "\\s+");
  const guard = SHORT_TERM.test(t) ? [GLUED_BEFORE, GLUED_AFTER] : ["", ""];
  return new RegExp(`${guard[0]}(?<![A-Za-z0-9])${body}(?![A-Za-z0-9])${guard[1]}`, "gi");
}

function overlaps(claimed: Array<[number, number]>, start: number, end: number): boolean {
  return claimed.some(([s, e]) => start < e && s < end);
}

function byLengthThenText<T>(a: TermEntry<T>, b: TermEntry<T>): number {
  const d = b.term.length - a.term.length;
  if (d !== 0) return d;
  return a.term < b.term ? -1 : a.term > b.term ? 1 : 0;
}

export type AcceptHit<T> = (entry: TermEntry<T>, start: number, end: number) => boolean;

/**
 * Finds non-overlapping occurrences of every term. Longer terms claim their spans first,
 * so "React Native" wins over "React" and "Node.js" over "Node".
 * An occurrence turned down by `accept` claims nothing.
 * Hits come back in text order.
 */
export function findTermHits<T>(
  text: string,
  entries: ReadonlyArray<TermEntry<T>>,
  accept?: AcceptHit<T>
): TermHit<T>[] {
  const t = String(text || "");
  if (!t) return [];

  const claimed: Array<[number, number]> = [];
  const hits: TermHit<T>[] = [];

  for (const entry of entries.filter((s) => s.term.trim()).sort(byLengthThenText)) {
    const re = termRegExp(entry.term);
    let m: RegExpExecArray | null = null;
    while ((m = re.exec(t)) !== null) {
      const start = m.index;
      const end = start + m[0].length;
      if (overlaps(claimed, start, end)) continue;
      if (accept && !accept(entry, start, end)) continue;
      claimed.push([start, end]);
      hits.push({ value: entry.value, term: entry.term, text: m[0], start, end });
    }
  }

  return hits.sort((a, b) => a.start - b.start || b.end - a.end);
}

/** Blanks out emails and URLs (same length, so offsets stay valid). */
export function maskLinks(text: string): string {
  return String(text || "").replace(
    /\S+@\S+\.\S+|(?:https?:\/\/|www\.)\S+|\b(?:linkedin|github)\.com\/\S*/gi,
    (m) => " ".repeat(m.length)
  );
}
