// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Source of uniformly distributed numbers in `[0, 1)`.
 *
 * Every generator takes one of these explicitly; tests pass a seeded
 * source to get reproducible sequences.
 */
export interface Random {
  next(): number;
}

/** Random source backed by `Math.random`. */
export const systemRandom: Random = {
  next: () => Math.random(),
};

/**
 * Deterministic random source (mulberry32) for reproducible runs.
 */
export function createSeededRandom(seed: number): Random {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Uniform float in `[min, max)`. */
export function uniform(rng: Random, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/** Uniform integer in `[min, max]`, both inclusive. */
export function randomInt(rng: Random, min: number, max: number): number {
  const lo = Math.ceil(Math.min(min, max));
  const hi = Math.floor(Math.max(min, max));
  if (hi <= lo) {
    return lo;
  }
  return lo + Math.floor(rng.next() * (hi - lo + 1));
}

/** `true` with the given probability. */
export function chance(rng: Random, probability: number): boolean {
  if (probability <= 0) return false;
  if (probability >= 1) return true;
  return rng.next() < probability;
}

/** Uniformly chosen element, or `undefined` for an empty list. */
export function pick<T>(rng: Random, items: readonly T[]): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[Math.floor(rng.next() * items.length)];
}
