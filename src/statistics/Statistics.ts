import { ValidationError, validateFinite } from '../utils/validation.js';

/**
 * Anything that can tell the current simulated time.
 */
export interface Clock {
  readonly now: number;
}

/**
 * Summary of a sampled metric
 */
export interface SampleSummary {
  count: number;
  mean: number;
  min: number;
  max: number;
  stdDev: number;
}

/**
 * Plain-object export of everything a Statistics instance has collected
 */
export interface StatisticsSnapshot {
  simulationTime: number;
  averages: Record<string, number>;
  peaks: Record<string, number>;
  counters: Record<string, number>;
  samples: Record<string, SampleSummary>;
}

interface SampleState {
  count: number;
  mean: number;
  m2: number;
  min: number;
  max: number;
}

/**
 * Statistics collector for the tick-based simulator.
 * Tracks time-weighted averages, counters, and sample summaries.
 *
 * Sample summaries are kept online (Welford's algorithm) without storing
 * the raw values, so a run creating millions of requests stays flat in memory.
 *
 * @example
 * ```typescript
 * const stats = new Statistics(sim);
 *
 * stats.recordValue('queue-length', queue.length);
 * stats.increment('requests-failed');
 * stats.recordSample('queue-wait', 12);
 *
 * const avgQueueLength = stats.getAverage('queue-length');
 * const failed = stats.getCount('requests-failed');
 * ```
 */
export class Statistics {
  // Time-weighted averages
  private readonly values: Map<string, number> = new Map(); // Current values
  private readonly valueSums: Map<string, number> = new Map(); // Time-weighted sums
  private readonly lastUpdateTimes: Map<string, number> = new Map(); // Last update time
  private readonly firstUpdateTimes: Map<string, number> = new Map();
  private readonly peaks: Map<string, number> = new Map();

  // Counters
  private readonly counters: Map<string, number> = new Map();

  // Welford's algorithm for online mean/variance
  private readonly samples: Map<string, SampleState> = new Map();

  constructor(private readonly clock: Clock) {}

  /**
   * Record a time-weighted value.
   * The value is assumed to remain constant until the next recording.
   *
   * @example
   * ```typescript
   * stats.recordValue('busy-workers', busy);
   * ```
   */
  recordValue(name: string, value: number): void {
    this.validateName(name);
    validateFinite(value, 'value', 'Metric values must be valid numbers');

    const currentTime = this.clock.now;
    const previousValue = this.values.get(name);
    const previousTime = this.lastUpdateTimes.get(name);

    if (previousValue !== undefined && previousTime !== undefined) {
      const timeDelta = currentTime - previousTime;
      if (timeDelta > 0) {
        const currentSum = this.valueSums.get(name) ?? 0;
        this.valueSums.set(name, currentSum + previousValue * timeDelta);
      }
    } else {
      this.firstUpdateTimes.set(name, currentTime);
    }

    this.values.set(name, value);
    this.lastUpdateTimes.set(name, currentTime);

    const peak = this.peaks.get(name);
    if (peak === undefined || value > peak) {
      this.peaks.set(name, value);
    }
  }

  /**
   * Get the time-weighted average of a metric, treating the latest value
   * as holding for at least one more time unit.
   *
   * @returns Average value, or 0 if never recorded
   */
  getAverage(name: string): number {
    const currentValue = this.values.get(name);
    const lastUpdateTime = this.lastUpdateTimes.get(name);
    const firstUpdateTime = this.firstUpdateTimes.get(name);
    if (
      currentValue === undefined ||
      lastUpdateTime === undefined ||
      firstUpdateTime === undefined
    ) {
      return 0;
    }

    // The latest value covers [lastUpdateTime, max(now, lastUpdateTime + 1))
    const endTime = Math.max(this.clock.now, lastUpdateTime + 1);
    const totalSum =
      (this.valueSums.get(name) ?? 0) + currentValue * (endTime - lastUpdateTime);

    return totalSum / (endTime - firstUpdateTime);
  }

  /**
   * Highest value ever passed to recordValue() for a metric.
   *
   * @returns Peak value, or 0 if never recorded
   */
  getPeak(name: string): number {
    return this.peaks.get(name) ?? 0;
  }

  /**
   * Increment a counter by a specified amount.
   *
   * @example
   * ```typescript
   * stats.increment('requests-total');
   * stats.increment('retries', 3);
   * ```
   */
  increment(name: string, amount = 1): void {
    this.validateName(name);
    validateFinite(amount, 'amount', 'Increment amount must be a valid number');

    this.counters.set(name, (this.counters.get(name) ?? 0) + amount);
  }

  /**
   * @returns Current count, or 0 if never incremented
   */
  getCount(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  /**
   * Record one observation of a sampled metric.
   *
   * @example
   * ```typescript
   * stats.recordSample('work-ticks', request.remainingWorkTicks);
   * ```
   */
  recordSample(name: string, value: number): void {
    this.validateName(name);
    validateFinite(value, 'value', 'Sample values must be valid numbers');

    const state = this.samples.get(name) ?? {
      count: 0,
      mean: 0,
      m2: 0,
      min: value,
      max: value,
    };

    // Welford's online algorithm:
    // delta = value - oldMean
    // mean = oldMean + delta / count
    // M2 = M2 + delta * (value - mean)
    state.count++;
    const delta = value - state.mean;
    state.mean += delta / state.count;
    state.m2 += delta * (value - state.mean);
    state.min = Math.min(state.min, value);
    state.max = Math.max(state.max, value);

    this.samples.set(name, state);
  }

  getSampleCount(name: string): number {
    return this.samples.get(name)?.count ?? 0;
  }

  /**
   * @returns Arithmetic mean of the samples, or 0 if none
   */
  getSampleMean(name: string): number {
    return this.samples.get(name)?.mean ?? 0;
  }

  getMin(name: string): number {
    return this.samples.get(name)?.min ?? 0;
  }

  getMax(name: string): number {
    return this.samples.get(name)?.max ?? 0;
  }

  /**
   * Population variance (M2 / n) of the samples, or 0 if none.
   */
  getVariance(name: string): number {
    const state = this.samples.get(name);
    if (!state || state.count === 0) {
      return 0;
    }
    return state.m2 / state.count;
  }

  getStdDev(name: string): number {
    return Math.sqrt(this.getVariance(name));
  }

  /**
   * Export all statistics to a plain object.
   *
   * @example
   * ```typescript
   * console.log(JSON.stringify(stats.toJSON(), null, 2));
   * ```
   */
  toJSON(): StatisticsSnapshot {
    const snapshot: StatisticsSnapshot = {
      simulationTime: this.clock.now,
      averages: {},
      peaks: {},
      counters: {},
      samples: {},
    };

    for (const name of this.values.keys()) {
      snapshot.averages[name] = this.getAverage(name);
      snapshot.peaks[name] = this.getPeak(name);
    }

    for (const [name, count] of this.counters.entries()) {
      snapshot.counters[name] = count;
    }

    for (const name of this.samples.keys()) {
      snapshot.samples[name] = {
        count: this.getSampleCount(name),
        mean: this.getSampleMean(name),
        min: this.getMin(name),
        max: this.getMax(name),
        stdDev: this.getStdDev(name),
      };
    }

    return snapshot;
  }

  private validateName(name: string): void {
    if (!name || name.trim() === '') {
      throw new ValidationError('Metric name cannot be empty', { name });
    }
  }
}
