/**
 * Seeded randomness for reproducible seed runs.
 *
 * Every generator in this folder takes an `Rng` instead of calling
 * `Math.random()`, so the sessions a run generates are fully determined by
 * its seed and its date.
 */

/** Source of floats in [0, 1). */
export type Rng = () => number;

export const DEFAULT_SEED = 42;

/** mulberry32: small, fast 32-bit PRNG yielding floats in [0, 1). */
export function createRandom(seed: number = DEFAULT_SEED): Rng {
  let state = seed | 0;
  return function () {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [min, max], both inclusive. */
export function randomInt(rng: Rng, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

export function randomFloat(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min);
}

/**
 * Pick one item with probability proportional to its weight.
 * Weights need not sum to 1.
 */
export function weightedChoice<T>(rng: Rng, items: readonly T[], weights: readonly number[]): T {
  if (items.length === 0 || items.length !== weights.length) {
    throw new Error(
      `weightedChoice needs one weight per item (got ${items.length} items, ${weights.length} weights)`
    );
  }

  const total = weights.reduce((sum, w) => sum + w, 0);
  const target = rng() * total;
  let cumulative = 0;
  for (let i = 0; i < items.length; i++) {
    cumulative += weights[i];
    if (target < cumulative) {
      return items[i];
    }
  }
  // float rounding can leave target == total
  return items[items.length - 1];
}
