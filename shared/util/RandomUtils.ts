// ============================================================================
// RandomUtils.ts
// Seeded random number generation for opponent draws and automatic play.
//
// Given the same seed, the same sequence of draws is produced, so a game
// started with --seed can be replayed exactly.
//
// We use the Mulberry32 algorithm: a fast 32-bit PRNG that is simple to
// implement and good enough for game use.
// ============================================================================

// ----------------------------------------------------------------------------
// CORE PRNG: Mulberry32
// ----------------------------------------------------------------------------

/**
 * Creates a Mulberry32 pseudo-random number generator from a seed.
 *
 * The returned function produces uniformly distributed floats in [0, 1).
 *
 * @param seed - An integer seed value. Using the same seed guarantees identical output.
 * @returns A function that, when called, returns the next random float in [0, 1)
 *
 * @example
 * const rng = mulberry32(12345);
 * rng(); // Always returns the same first value for seed 12345
 */
export function mulberry32(seed: number): () => number {
  let state = seed | 0;

  return function (): number {
    // 0x6D2B79F5 = 1831565813, an odd constant from the golden ratio
    state = (state + 0x6D2B79F5) | 0;

    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;

    // >>> 0 converts to unsigned 32-bit, dividing by 2^32 maps to [0, 1)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ----------------------------------------------------------------------------
// RANDOM SOURCE
// The narrow interface the game logic depends on. Tests inject scripted
// sources through it; the CLI injects a SeededRandom.
// ----------------------------------------------------------------------------

/** Anything that can draw an integer in an inclusive range */
export interface RandomSource {
  /**
   * @param min - Minimum value (inclusive)
   * @param max - Maximum value (inclusive)
   */
  nextInt(min: number, max: number): number;
}

// ----------------------------------------------------------------------------
// SEEDED RANDOM CLASS
// ----------------------------------------------------------------------------

/**
 * A seeded random number generator with the operations the game needs.
 *
 * All methods are deterministic given the same seed and call sequence.
 *
 * @example
 * const rng = new SeededRandom(42);
 * const opponent = rng.nextInt(10, 16);  // index inside the round 2 tier
 * const pick = rng.pick(candidates);
 */
export class SeededRandom implements RandomSource {
  /** The underlying Mulberry32 PRNG function */
  private readonly rng: () => number;

  /** Seed this generator was created with (shown so a game can be replayed) */
  readonly seed: number;

  /**
   * @param seed - Integer seed for the PRNG. Same seed = same sequence.
   */
  constructor(seed: number) {
    this.seed = seed;
    this.rng = mulberry32(seed);
  }

  /** Returns the next random float in the range [0, 1). */
  next(): number {
    return this.rng();
  }

  /**
   * Returns a random integer in [min, max], inclusive on both ends.
   *
   * Formula: floor(rng() * (max - min + 1)) + min
   *
   * @example
   *   nextInt(1, 6) -> 1, 2, 3, 4, 5 or 6
   */
  nextInt(min: number, max: number): number {
    return Math.floor(this.rng() * (max - min + 1)) + min;
  }
}

/**
 * Picks a random element from a non-empty array.
 *
 * @param rng - Source of randomness
 * @param array - The array to pick from (must not be empty)
 * @throws Error if the array is empty
 */
export function pick<T>(rng: RandomSource, array: readonly T[]): T {
  if (array.length === 0) {
    throw new Error('Cannot pick from an empty array');
  }
  return array[rng.nextInt(0, array.length - 1)];
}
