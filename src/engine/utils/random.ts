/**
 * Seeded randomness - Mulberry32 PRNG and small helpers on top of it
 */

import type { RandomSource } from '../types/common.js';

/**
 * Mulberry32: fast, well distributed, deterministic for a given 32-bit seed
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [min, max] inclusive */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function randomChoice<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot choose from an empty list');
  }
  return items[randomInt(random, 0, items.length - 1)];
}

/**
 * Pick `count` distinct items (partial Fisher-Yates over a copy)
 */
export function sampleWithoutReplacement<T>(
  random: RandomSource,
  items: readonly T[],
  count: number
): T[] {
  const pool = [...items];
  const n = Math.min(count, pool.length);
  for (let i = 0; i < n; i++) {
    const j = randomInt(random, i, pool.length - 1);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, n);
}

/** Derive a fresh 32-bit seed from a random source */
export function nextSeed(random: RandomSource): number {
  return Math.floor(random() * 4294967296) >>> 0;
}
