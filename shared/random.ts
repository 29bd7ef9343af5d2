// ============================================
// Random Sources
// ============================================

import type { RandomSource } from './types';

/**
 * mulberry32 - small, fast 32-bit seeded PRNG.
 * Same seed, same sequence; output is in [0, 1).
 */
export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seeded source when a seed is given, Math.random otherwise
 */
export function createRandom(seed?: number): RandomSource {
  return seed === undefined ? Math.random : mulberry32(seed);
}
