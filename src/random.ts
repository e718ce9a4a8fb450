// src/random.ts

/** Returns a float in [0, 1). */
export type Random = () => number;

/**
 * Small seeded PRNG (mulberry32) for reproducible topologies and layouts.
 */
export function seededRandom(seed: number): Random {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [0, maxExclusive). */
export function randomInt(random: Random, maxExclusive: number): number {
  return Math.floor(random() * maxExclusive);
}
