/** Returns a float in [0, 1). */
export type Rng = () => number;

/**
 * mulberry32: small, fast and identical across browsers, so a seed replays the
 * same bot choices everywhere.
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  return (): number => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function pickIndex(rng: Rng, length: number): number {
  return Math.min(length - 1, Math.floor(rng() * length));
}
