/**
 * Seeded PRNG helpers. Graph building draws from these instead of
 * Math.random so a seed reproduces the same vault.
 */

export type Rng = () => number;

/** Seed used when the caller passes none. */
export const DEFAULT_SEED = 42;

export function mulberry32(seed: number): Rng {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fold an arbitrary seed (string or number) into a 32-bit integer.
 */
export function normalizeSeed(seed: number | string | undefined): number {
  if (seed === undefined) return DEFAULT_SEED;
  if (typeof seed === 'number') return Math.trunc(seed) | 0;

  // FNV-1a
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash | 0;
}
