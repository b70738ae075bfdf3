export type RandomFn = () => number;

/**
 * Deterministic generator (mulberry32) returning values in [0, 1).
 * The same seed always yields the same sequence.
 */
export function createSeededRandom(seed: number): RandomFn {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Spread a byte seed (and an optional salt) over 32 bits before seeding. */
export function mixSeed(seed: number, salt = 0): number {
  let h = Math.imul((seed & 0xff) ^ 0x9e3779b9, 0x85ebca6b);
  h ^= Math.imul(salt + 0x27d4eb2f, 0xc2b2ae35);
  h ^= h >>> 13;
  h = Math.imul(h, 0x85ebca6b);
  return (h ^ (h >>> 16)) >>> 0;
}
