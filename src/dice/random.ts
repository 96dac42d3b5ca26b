import { randomInt } from 'crypto';

/**
 * Random sources for dice rolls
 *
 * A random source is a function returning a float in [0, 1), the same
 * contract as `Math.random`. The roll evaluator takes one as a parameter so
 * tests can supply fixed sequences.
 *
 * Supported methods:
 * - 'math': `Math.random` (default)
 * - 'crypto': Node's `crypto.randomInt`, scaled to [0, 1)
 * - 'mulberry32': small seeded PRNG, deterministic for a given seed
 *
 * @module dice/random
 */

export type RandomSource = () => number;

export type RngMethod = 'math' | 'crypto' | 'mulberry32';

const CRYPTO_RANGE = 1 << 30;

/**
 * Seeded mulberry32 generator. Each call advances the internal state.
 */
export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r = (r + Math.imul(r ^ (r >>> 7), 61 | r)) ^ r;
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Build the random source named by `method`.
 *
 * For 'mulberry32' a numeric (or numeric string) `seed` is used; without
 * one the current time seeds the generator. Create the source once and
 * reuse it, otherwise a fixed seed repeats the same rolls.
 */
export function createRandomSource(
  method: RngMethod,
  seed?: number | string | null,
): RandomSource {
  switch (method) {
    case 'crypto':
      return () => randomInt(0, CRYPTO_RANGE) / CRYPTO_RANGE;
    case 'mulberry32': {
      const seedNum = seed == null || seed === '' ? NaN : Number(seed);
      return mulberry32(Number.isFinite(seedNum) ? seedNum : Date.now());
    }
    case 'math':
      return Math.random;
  }
}
