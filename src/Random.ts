/**
 * Source of uniform floats in [0, 1). `Math.random` satisfies it.
 * @public
 */
export type RandomSource = () => number;

/**
 * Deterministic 32-bit generator (mulberry32) for reproducible initialization.
 * @param seed Any integer; only the low 32 bits are used
 */
export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Maps a draw from `random` into [min, max). */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}
