import type { RandomSource } from '../random/Random.js';
import { validateFinite, validatePositive } from '../utils/validation.js';

/**
 * Turns a continuous arrival rate into whole requests per tick.
 *
 * Each tick one Normal(rate, rate / 4) sample is added to a fractional
 * accumulator, and whole requests are drained from it while it stays above
 * zero. Fractions carry over to later ticks, so a rate of 0.25 yields
 * roughly one request every four ticks. Negative samples simply lower the
 * accumulator.
 *
 * @example
 * ```typescript
 * const arrivals = new ArrivalProcess(2.5, rng);
 * arrivals.accumulate();
 * const created = arrivals.drain(() => admit());
 * ```
 */
export class ArrivalProcess {
  private incoming = 0;

  constructor(
    public readonly rate: number,
    private readonly random: RandomSource
  ) {
    validateFinite(rate, 'arrivalRate');
    validatePositive(rate, 'arrivalRate', 'Request arrival rate must be greater than 0');
  }

  /** Current fractional accumulator value */
  get incomingRequests(): number {
    return this.incoming;
  }

  /**
   * Add this tick's arrival sample to the accumulator.
   *
   * @returns The raw sample
   */
  accumulate(): number {
    const sample = this.random.normal(this.rate, this.rate / 4);
    this.incoming += sample;
    return sample;
  }

  /**
   * Emit whole requests while the accumulator is above zero. Each emitted
   * request lowers the accumulator by exactly 1.0; `admit` may push it back
   * up through {@link reinject}, in which case the loop keeps going.
   *
   * @returns Number of requests emitted
   */
  drain(admit: () => void): number {
    let emitted = 0;
    while (this.incoming > 0) {
      this.incoming -= 1;
      emitted++;
      admit();
    }
    return emitted;
  }

  /**
   * Put one retried request back into the accumulator.
   */
  reinject(): void {
    this.incoming += 1;
  }
}
