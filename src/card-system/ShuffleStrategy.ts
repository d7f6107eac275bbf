/**
 * Interchangeable shuffle algorithms.
 *
 * Every strategy is generic over the element type, returns a new
 * array and leaves its input untouched. The output is always a
 * permutation of the input: nothing is added or dropped.
 *
 * Each strategy takes an optional random number generator for
 * deterministic testing. The generator must return a value in
 * [0, 1) (same contract as Math.random).
 */

import { InvalidArgumentError } from './errors';

/** Random source with the Math.random contract. */
export type Rng = () => number;

/** Configuration names of the built-in strategies. */
export const SHUFFLE_STRATEGY_NAMES = [
  'random',
  'riffle',
  'fisher-yates',
  'weak',
] as const;

export type ShuffleStrategyName = (typeof SHUFFLE_STRATEGY_NAMES)[number];

export interface ShuffleStrategy {
  /** Label used in logs; built-in strategies use their configuration name. */
  readonly name: string;
  shuffle<T>(items: readonly T[]): T[];
}

export interface ShuffleOptions {
  /** RNG (default Math.random). */
  rng?: Rng;
}

/** Uniform integer in [0, bound). */
function randomIndex(rng: Rng, bound: number): number {
  return Math.floor(rng() * bound);
}

function swap<T>(items: T[], i: number, j: number): void {
  [items[i], items[j]] = [items[j], items[i]];
}

// ── Strategies ──────────────────────────────────────────────

/**
 * Uniform shuffle of the whole sequence: every element gets a random
 * sort key and the sequence is ordered by it.
 */
export class RandomShuffle implements ShuffleStrategy {
  readonly name = 'random';
  private readonly rng: Rng;

  constructor(options: ShuffleOptions = {}) {
    this.rng = options.rng ?? Math.random;
  }

  shuffle<T>(items: readonly T[]): T[] {
    return items
      .map((item) => ({ item, key: this.rng() }))
      .sort((a, b) => a.key - b.key)
      .map(({ item }) => item);
  }
}

/**
 * Simulated physical riffle: cut at the midpoint, then repeatedly take
 * the front card of a half chosen 50/50 until one half runs out, and
 * finish with the rest of the other. Not uniform.
 */
export class RiffleShuffle implements ShuffleStrategy {
  readonly name = 'riffle';
  private readonly rng: Rng;

  constructor(options: ShuffleOptions = {}) {
    this.rng = options.rng ?? Math.random;
  }

  shuffle<T>(items: readonly T[]): T[] {
    const mid = Math.floor(items.length / 2);
    const left = items.slice(0, mid);
    const right = items.slice(mid);
    const mixed: T[] = [];

    let l = 0;
    let r = 0;
    while (l < left.length && r < right.length) {
      if (this.rng() < 0.5) {
        mixed.push(left[l++]);
      } else {
        mixed.push(right[r++]);
      }
    }
    mixed.push(...left.slice(l), ...right.slice(r));
    return mixed;
  }
}

/**
 * Classic Fisher-Yates: walk from the last index down, swapping each
 * element with a uniformly chosen element at or below it.
 */
export class FisherYatesShuffle implements ShuffleStrategy {
  readonly name = 'fisher-yates';
  private readonly rng: Rng;

  constructor(options: ShuffleOptions = {}) {
    this.rng = options.rng ?? Math.random;
  }

  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      swap(result, i, randomIndex(this.rng, i + 1));
    }
    return result;
  }
}

export interface WeakShuffleOptions extends ShuffleOptions {
  /** Number of random pairwise swaps (default 10). */
  swaps?: number;
}

/**
 * A fixed number of random pairwise swaps. Fast and intentionally
 * poor at mixing long sequences.
 */
export class WeakShuffle implements ShuffleStrategy {
  readonly name = 'weak';
  readonly swaps: number;
  private readonly rng: Rng;

  /**
   * @throws InvalidArgumentError if `swaps` is negative or not an integer.
   */
  constructor(options: WeakShuffleOptions = {}) {
    const { swaps = 10, rng = Math.random } = options;
    if (!Number.isInteger(swaps) || swaps < 0) {
      throw new InvalidArgumentError(
        `Swap count must be a non-negative integer, got ${swaps}`,
      );
    }
    this.swaps = swaps;
    this.rng = rng;
  }

  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    if (result.length === 0) return result;

    for (let n = 0; n < this.swaps; n++) {
      swap(
        result,
        randomIndex(this.rng, result.length),
        randomIndex(this.rng, result.length),
      );
    }
    return result;
  }
}

// ── Lookup by name ──────────────────────────────────────────

/**
 * Build a strategy from its configuration name.
 *
 * @throws InvalidArgumentError for an unknown name.
 */
export function createShuffleStrategy(
  name: string,
  options: WeakShuffleOptions = {},
): ShuffleStrategy {
  switch (name) {
    case 'random':
      return new RandomShuffle(options);
    case 'riffle':
      return new RiffleShuffle(options);
    case 'fisher-yates':
      return new FisherYatesShuffle(options);
    case 'weak':
      return new WeakShuffle(options);
    default:
      throw new InvalidArgumentError(
        `Unknown shuffle strategy "${name}". ` +
          `Expected one of: ${SHUFFLE_STRATEGY_NAMES.join(', ')}`,
      );
  }
}
