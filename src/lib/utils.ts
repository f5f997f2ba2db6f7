// src/lib/utils.ts

export function clamp(x: number, lo: number, hi: number): number {
  if (Number.isNaN(x)) return lo;
  if (x < lo) return lo;
  if (x > hi) return hi;
  return x;
}

export function round2(x: number): number {
  return Math.round((x + Number.EPSILON) * 100) / 100;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/** Adds up to 250ms of random delay so retries from parallel callers spread out. */
export function jitter(ms: number): number {
  const j = Math.floor(Math.random() * Math.min(250, ms));
  return ms + j;
}
