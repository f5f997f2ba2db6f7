// core/domain/similarity.ts
import { readFileSync } from "node:fs";
import { z } from "zod";

import { tokenize } from "../extract/normalize";

const STOPWORDS_URL = new URL("../../data/stopwords.json", import.meta.url);

let stopwords: ReadonlySet<string> | null = null;

export function englishStopwords(): ReadonlySet<string> {
  if (!stopwords) {
    const list = z.array(z.string()).parse(JSON.parse(readFileSync(STOPWORDS_URL, "utf8")));
    stopwords = new Set(list);
  }
  return stopwords;
}

/** Unigrams plus adjacent bigrams, built after stop-word removal. */
export function termsOf(text: string, stop: ReadonlySet<string> = englishStopwords()): string[] {
  const toks = tokenize(text).filter((t) => !stop.has(t));
  const out = [...toks];
  for (let i = 0; i + 1 < toks.length; i++) out.push(`${toks[i]} ${toks[i + 1]}`);
  return out;
}

function counts(terms: string[]): Map<string, number> {
  const m = new Map<string, number>();
  for (const t of terms) m.set(t, (m.get(t) || 0) + 1);
  return m;
}

function l2normalize(v: Map<string, number>): Map<string, number> {
  let sq = 0;
  for (const x of v.values()) sq += x * x;
  const norm = Math.sqrt(sq);
  if (norm === 0) return v;
  const out = new Map<string, number>();
  for (const [k, x] of v) out.set(k, x / norm);
  return out;
}

/**
 * TF-IDF cosine of two documents, fitted on the pair itself.
 * Smoothed idf: ln((1 + n) / (1 + df)) + 1. Returns 0..1; 0 when either side has no terms.
 */
export function tfidfCosineSimilarity(a: string, b: string): number {
  const docs = [counts(termsOf(a)), counts(termsOf(b))];
  if (docs.some((d) => d.size === 0)) return 0;

  const n = docs.length;
  const df = new Map<string, number>();
  for (const d of docs) for (const t of d.keys()) df.set(t, (df.get(t) || 0) + 1);

  const [va, vb] = docs.map((d) => {
    const v = new Map<string, number>();
    for (const [t, tf] of d) v.set(t, tf * (Math.log((1 + n) / (1 + (df.get(t) || 0))) + 1));
    return l2normalize(v);
  });

  let dot = 0;
  for (const [t, x] of va) dot += x * (vb.get(t) || 0);
  return Math.min(1, Math.max(0, dot));
}

/** Cosine of two dense vectors; 0 for empty, zero-length or mismatched inputs. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}
