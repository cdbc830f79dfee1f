// ============================================================================
// RANDOM SOURCE - Injected into every kernel operation that needs randomness
// ============================================================================

/** Returns a float in [0, 1) */
export type Rng = () => number;

/** Process-global randomness; the default when no seed is given */
export const systemRng: Rng = () => Math.random();

// Mulberry32 PRNG for deterministic sessions
export function createSeededRng(seed: number): Rng {
  let s = seed >>> 0;
  return function () {
    s += 0x6D2B79F5;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [0, maxExclusive). Stays in range even if rng() returns 1. */
export function randomInt(rng: Rng, maxExclusive: number): number {
  if (maxExclusive <= 0) return 0;
  return Math.min(maxExclusive - 1, Math.floor(rng() * maxExclusive));
}

/** Float in [min, max) */
export function randomRange(rng: Rng, min: number, max: number): number {
  return min + (max - min) * rng();
}
