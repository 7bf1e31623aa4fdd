/**
 * Random Sampling
 *
 * Sampling helpers used by the generators. The random source is always
 * passed in, so a seeded source makes a batch reproducible.
 */

import type { RandomSource } from './types';

/**
 * Creates a deterministic random source (mulberry32) from a 32-bit seed.
 *
 * @example
 * ```typescript
 * const random = createSeededRandom(42);
 * const generator = new SimpleGenerator(store, { random });
 * ```
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

/**
 * Draws `count` distinct items, each with equal probability.
 */
export function sampleUniform<T>(items: readonly T[], count: number, random: RandomSource): T[] {
  return sampleWeighted(items, items.map(() => 1), count, random);
}

/**
 * Draws up to `count` distinct items. Each draw picks among the items not
 * yet drawn with probability proportional to their weight.
 *
 * Items with weight 0 are only drawn once every positive-weight item has
 * been drawn, and then uniformly.
 *
 * @param weights - One non-negative weight per item
 */
export function sampleWeighted<T>(
  items: readonly T[],
  weights: readonly number[],
  count: number,
  random: RandomSource
): T[] {
  if (items.length !== weights.length) {
    throw new RangeError(`Got ${weights.length} weights for ${items.length} items`);
  }

  const remaining = items.map((item, index) => ({ item, weight: weights[index] }));
  const picked: T[] = [];
  const target = Math.min(Math.max(0, count), items.length);

  while (picked.length < target) {
    const index = pickIndex(
      remaining.map((entry) => entry.weight),
      random
    );
    picked.push(remaining[index].item);
    remaining.splice(index, 1);
  }

  return picked;
}

function pickIndex(weights: number[], random: RandomSource): number {
  const total = weights.reduce((sum, weight) => sum + weight, 0);

  if (!(total > 0)) {
    return Math.min(weights.length - 1, Math.floor(random() * weights.length));
  }

  const threshold = random() * total;
  let cumulative = 0;
  let lastPositive = 0;
  for (let i = 0; i < weights.length; i++) {
    if (weights[i] <= 0) {
      continue;
    }
    cumulative += weights[i];
    lastPositive = i;
    if (threshold < cumulative) {
      return i;
    }
  }

  // Rounding can leave the threshold just above the final sum
  return lastPositive;
}
