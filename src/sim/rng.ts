/**
 * Seeded randomness for generation, backed by the rot-js RNG.
 */
import * as ROT from "rot-js";

export type RNG = typeof ROT.RNG;

/** Anything that yields uniform floats in [0, 1). */
export interface RandomSource {
  getUniform(): number;
}

/**
 * Independent RNG instance: seeding it leaves the global ROT.RNG alone.
 */
export function createRng(seed: number): RNG {
  const rng = ROT.RNG.clone();
  rng.setSeed(seed);
  return rng;
}

/** In-place Fisher-Yates shuffle driven by the given source. */
export function shuffle<T>(rng: RandomSource, items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng.getUniform() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

export function randomInt(rng: RandomSource, lowerInclusive: number, upperInclusive: number): number {
  return lowerInclusive + Math.floor(rng.getUniform() * (upperInclusive - lowerInclusive + 1));
}
