// Deterministic random source (mulberry32) and helpers
//
// Every random decision goes through an Rng passed in by the caller, so a
// seeded source replays a battle exactly.

import { getConfig } from './config.js';

export type Rng = {
  /** Float in [0, 1) */
  next(): number;
};

export function createRng(seed: number): Rng {
  let a = seed >>> 0;
  return {
    next() {
      a |= 0;
      a = (a + 0x6d2b79f5) | 0;
      let t = Math.imul(a ^ (a >>> 15), 1 | a);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Unseeded source, for when reproducibility does not matter
 */
export function randomRng(): Rng {
  return createRng(Math.floor(Math.random() * 4294967296));
}

/**
 * Uniform integer, inclusive min, inclusive max
 */
export function nextInt(rng: Rng, min: number, max: number): number {
  return Math.floor(rng.next() * (max - min + 1)) + min;
}

export function nextBoolean(rng: Rng): boolean {
  return rng.next() < 0.5;
}

/**
 * Uniform bigint in [0, 2^63), built from a 31-bit and a 32-bit draw
 */
export function nextBigInt63(rng: Rng): bigint {
  const high = BigInt(Math.floor(rng.next() * 2147483648));
  const low = BigInt(Math.floor(rng.next() * 4294967296));
  return (high << 32n) | low;
}

let defaultRng: Rng | null = null;

/**
 * Process-wide source, seeded from ARMORY_SEED when it is set
 */
export function getDefaultRng(): Rng {
  if (!defaultRng) {
    const { seed } = getConfig();
    defaultRng = seed === undefined ? randomRng() : createRng(seed);
  }
  return defaultRng;
}
