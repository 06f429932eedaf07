// packages/game-core/src/random.ts
//
// Secret drawing.
//
// Sessions take a `() => number` in [0, 1). Math.random is the default;
// `seededRandom` gives reproducible games from a string seed.

import { CODE_LENGTH, DIGIT_COUNT, type Code } from './codes.js';

export type RandomSource = () => number;

// Deterministic lightweight RNG (Mulberry32)
export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/** 32-bit FNV-1a hash of a string. */
export function hashSeed(seed: string): number {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

export function seededRandom(seed: string): RandomSource {
  return mulberry32(hashSeed(seed));
}

/**
 * drawSecret picks CODE_LENGTH distinct digits in order, each position
 * uniformly from the digits not yet used (a partial Fisher–Yates shuffle).
 * Every one of the 5040 codes is equally likely.
 */
export function drawSecret(random: RandomSource = Math.random): Code {
  const pool = Array.from({ length: DIGIT_COUNT }, (_, d) => d);
  for (let i = 0; i < CODE_LENGTH; i++) {
    const span = DIGIT_COUNT - i;
    // a source that returns 1 would otherwise index past the pool
    const j = i + Math.min(Math.floor(random() * span), span - 1);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return Object.freeze(pool.slice(0, CODE_LENGTH));
}
