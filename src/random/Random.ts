import { validateProbability } from '../utils/validation.js';

/**
 * The two sampling capabilities the simulation engine consumes.
 * Inject a custom implementation to script exact outcomes in tests.
 */
export interface RandomSource {
  /** Sample a normal distribution */
  normal(mean: number, stdDev: number): number;
  /** Run a Bernoulli trial that succeeds with probability `p` */
  bernoulli(p: number): boolean;
}

/**
 * Seedable random number generator for the congestion simulator.
 * Uses a Linear Congruential Generator (LCG) for reproducible random sequences.
 *
 * @example
 * ```typescript
 * const rng = new Random(12345); // Seeded for reproducibility
 *
 * const latency = rng.normal(50, 12.5); // Normal with mean 50, stddev 12.5
 * const retry = rng.bernoulli(0.5);     // Coin flip
 * ```
 */
export class Random implements RandomSource {
  private seed: number;
  private readonly a = 1664525; // LCG multiplier
  private readonly c = 1013904223; // LCG increment
  private readonly m = 2 ** 32; // LCG modulus
  private readonly maxSafeSeed = 2 ** 32 - 1; // Maximum safe seed value

  /**
   * Create a new random number generator.
   *
   * @param seed - Initial seed (default: current timestamp)
   */
  constructor(seed?: number) {
    // Use modulo to ensure timestamp fits within safe range
    const initialSeed = seed ?? (Date.now() % this.maxSafeSeed);
    this.validateSeed(initialSeed);
    this.seed = initialSeed;
  }

  /**
   * Get the current seed value.
   */
  getSeed(): number {
    return this.seed;
  }

  /**
   * Set a new seed value, restarting the sequence.
   *
   * @example
   * ```typescript
   * rng.setSeed(12345);
   * const value = rng.normal(0, 1); // Reproducible
   * ```
   */
  setSeed(seed: number): void {
    this.validateSeed(seed);
    this.seed = seed;
  }

  private validateSeed(seed: number): void {
    if (!Number.isFinite(seed)) {
      throw new Error(
        `Seed must be a finite number (got ${seed}). Use a valid integer seed for reproducible random sequences.`
      );
    }

    if (!Number.isInteger(seed)) {
      throw new Error(
        `Seed must be an integer (got ${seed}). Non-integer seeds may produce inconsistent results.`
      );
    }

    if (seed < 0) {
      throw new Error(
        `Seed must be non-negative (got ${seed}). Use a positive integer seed.`
      );
    }

    if (seed > this.maxSafeSeed) {
      throw new Error(
        `Seed exceeds maximum safe value of ${this.maxSafeSeed} (got ${seed}). Large seeds may cause overflow in LCG calculations.`
      );
    }
  }

  /**
   * Next raw value in [0, 1).
   */
  private next(): number {
    this.seed = (this.a * this.seed + this.c) % this.m;
    return this.seed / this.m;
  }

  /**
   * Generate a normally (Gaussian) distributed random number.
   * Uses the Box-Muller transform. Results are unbounded on both sides.
   *
   * @param mean - Mean value
   * @param stdDev - Standard deviation
   *
   * @example
   * ```typescript
   * // Arrivals this tick around a rate of 8
   * const arrivals = rng.normal(8, 2);
   * ```
   */
  normal(mean: number, stdDev: number): number {
    if (stdDev < 0) {
      throw new Error('stdDev must be non-negative');
    }
    if (stdDev === 0) {
      return mean;
    }

    // Box-Muller transform; u1 in (0, 1] keeps the logarithm finite
    const u1 = 1 - this.next();
    const u2 = this.next();

    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + z * stdDev;
  }

  /**
   * Run a Bernoulli trial. Always consumes exactly one draw, so
   * `p = 0` never succeeds and `p = 1` always does.
   *
   * @param p - Success probability in [0, 1]
   *
   * @example
   * ```typescript
   * if (rng.bernoulli(0.25)) {
   *   // retry
   * }
   * ```
   */
  bernoulli(p: number): boolean {
    validateProbability(p, 'p');
    return this.next() < p;
  }
}
