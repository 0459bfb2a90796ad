/**
 * Injectable random sources for the stochastic pipeline stages.
 *
 * Fallback positions, property draws and filler stars all take a
 * {@link RandomSource} so a run can be replayed from a seed.
 *
 * @packageDocumentation
 */

/**
 * A source of uniformly distributed floats in `[0, 1)`.
 */
export type RandomSource = () => number;

/**
 * Unseeded source backed by `Math.random`.
 */
export const defaultRandom: RandomSource = () => Math.random();

/**
 * Creates a deterministic mulberry32 generator.
 *
 * @param seed - Any finite number; it is truncated to 32 bits.
 * @returns A random source that yields the same sequence for the same seed.
 *
 * @example
 * ```typescript
 * const rng = createSeededRandom(42);
 * const a = rng();
 * const b = createSeededRandom(42)();
 * // a === b
 * ```
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), 1 | t);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draws a float uniformly from `[low, high)`.
 */
export function uniform(rng: RandomSource, low: number, high: number): number {
  return low + (high - low) * rng();
}

/**
 * Draws an integer uniformly from `[low, high]` (both inclusive).
 */
export function randomInt(rng: RandomSource, low: number, high: number): number {
  return low + Math.floor(rng() * (high - low + 1));
}

/**
 * A categorical outcome with its relative weight.
 */
export interface WeightedEntry<T> {
  readonly value: T;
  readonly weight: number;
}

/**
 * Draws one value from a categorical distribution.
 *
 * Weights need not sum to 1.
 *
 * @param rng - Random source.
 * @param entries - Outcomes with positive weights.
 * @returns The selected value.
 * @throws RangeError if the table is empty or its total weight is not positive.
 */
export function weightedChoice<T>(rng: RandomSource, entries: readonly WeightedEntry<T>[]): T {
  const total = entries.reduce((sum, entry) => sum + entry.weight, 0);
  const last = entries[entries.length - 1];
  if (last === undefined || !(total > 0)) {
    throw new RangeError('weightedChoice requires at least one entry with positive weight');
  }

  let threshold = rng() * total;
  for (const entry of entries) {
    if (threshold < entry.weight) {
      return entry.value;
    }
    threshold -= entry.weight;
  }

  // Floating-point residue can leave threshold just above the final weight.
  return last.value;
}
