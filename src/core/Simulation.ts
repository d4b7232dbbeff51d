import { ArrivalProcess } from './ArrivalProcess.js';
import { Request } from './Request.js';
import { RequestQueue } from './RequestQueue.js';
import { Worker } from './Worker.js';
import { Random, type RandomSource } from '../random/Random.js';
import { Statistics, type Clock, type StatisticsSnapshot } from '../statistics/Statistics.js';
import { failureRate } from '../statistics/report.js';
import {
  type SimulationParameters,
  type SimulationParametersInput,
  resolveParameters,
} from '../config/parameters.js';

/**
 * Configuration options for the simulation.
 */
export interface SimulationOptions extends SimulationParametersInput {
  /** Sampling source; takes precedence over randomSeed */
  random?: RandomSource;
  /** Seed for the built-in generator (default: random) */
  randomSeed?: number;
  /** Enable logging for debugging (default: false) */
  enableLogging?: boolean;
}

/**
 * Mutable run state owned by one simulation instance.
 */
export interface SimulationState {
  /** Ticks completed so far */
  tick: number;
  totalRequests: number;
  failedRequests: number;
  /** Fractional arrival accumulator */
  incomingRequests: number;
  /** Created requests still to receive the 10x latency multiplier */
  spikeRequestsRemaining: number;
}

/**
 * Why a request counted as failed
 */
export type FailureCause =
  | 'rejected' // queue full and every worker busy at admission
  | 'timed-out'; // finished after its timeout counter reached zero

/**
 * Payload of the 'failure' event
 */
export interface FailureEvent {
  tick: number;
  requestId: number;
  cause: FailureCause;
  /** Whether a retry was put back into the arrival accumulator */
  retried: boolean;
}

/**
 * Payload of the 'tick' event
 */
export interface TickSummary {
  tick: number;
  arrivals: number;
  completed: number;
  failures: number;
  retriesInjected: number;
  queueLength: number;
  busyWorkers: number;
}

/**
 * Result returned when the simulation completes.
 */
export interface SimulationResult {
  ticks: number;
  totalRequests: number;
  failedRequests: number;
  completedRequests: number;
  rejectedRequests: number;
  timedOutRequests: number;
  retriedRequests: number;
  spikedRequests: number;
  /** Percentage of failed requests, null when no request was created */
  failureRate: number | null;
  averageQueueLength: number;
  peakQueueLength: number;
  /** Average fraction of workers busy per tick, 0 with no workers */
  utilization: number;
  statistics: StatisticsSnapshot;
}

/**
 * Simulation lifecycle events and their payloads
 */
export interface SimulationEventMap {
  tick: TickSummary;
  failure: FailureEvent;
  complete: SimulationResult;
}

type EventHandler<T> = (payload: T) => void;

type HandlerSets = {
  [K in keyof SimulationEventMap]: Set<EventHandler<SimulationEventMap[K]>>;
};

interface PendingFailure {
  request: Request;
  cause: FailureCause;
}

/**
 * Tick-driven simulation of a bounded request queue in front of a fixed
 * worker pool, with client timeouts and retries.
 *
 * One tick runs, in order: queue aging, arrival admission, worker advance,
 * then failure and retry bookkeeping. Retries land in the arrival
 * accumulator after the tick's admission pass, so they are admitted on a
 * later tick.
 *
 * @example
 * ```typescript
 * const sim = new Simulation({
 *   arrivalRate: 0.25,
 *   workers: 10,
 *   simulationTicks: 100_000,
 *   simulateSpike: true,
 *   randomSeed: 42,
 * });
 *
 * const result = sim.run();
 * console.log(formatFailureRate(result.failureRate));
 * ```
 */
export class Simulation implements Clock {
  readonly parameters: Readonly<SimulationParameters>;
  private readonly random: RandomSource;
  private readonly arrivals: ArrivalProcess;
  private readonly queue: RequestQueue;
  private readonly workers: readonly Worker[];
  private readonly stats: Statistics;
  private readonly handlers: HandlerSets;
  private readonly enableLogging: boolean;
  private currentTick = 0;
  private totalRequests = 0;
  private failedRequests = 0;
  private spikeRequestsRemaining: number;
  private isRunning = false;

  /**
   * Create a new simulation instance.
   *
   * @throws {ValidationError} If any parameter is invalid
   */
  constructor(options: SimulationOptions) {
    const { random, randomSeed, enableLogging, ...input } = options;
    this.parameters = resolveParameters(input);
    this.random = random ?? new Random(randomSeed);
    this.enableLogging = enableLogging ?? false;

    this.arrivals = new ArrivalProcess(this.parameters.arrivalRate, this.random);
    this.queue = new RequestQueue(this.parameters.queueSize, {
      discipline: this.parameters.discipline,
    });
    this.workers = Array.from(
      { length: this.parameters.workers },
      (_, index) => new Worker(index)
    );
    this.stats = new Statistics(this);
    this.handlers = { tick: new Set(), failure: new Set(), complete: new Set() };
    this.spikeRequestsRemaining = this.parameters.simulateSpike
      ? Math.floor(this.parameters.simulationTicks / 1000)
      : 0;

    this.log('Simulation created', { parameters: this.parameters });
  }

  /**
   * Ticks completed so far.
   */
  get now(): number {
    return this.currentTick;
  }

  /**
   * Snapshot of the run state.
   */
  get state(): SimulationState {
    return {
      tick: this.currentTick,
      totalRequests: this.totalRequests,
      failedRequests: this.failedRequests,
      incomingRequests: this.arrivals.incomingRequests,
      spikeRequestsRemaining: this.spikeRequestsRemaining,
    };
  }

  /**
   * Live statistics collector for this run.
   */
  get statistics(): Statistics {
    return this.stats;
  }

  /**
   * Requests currently waiting, front to back.
   */
  get waitingRequests(): readonly Request[] {
    return this.queue.toArray();
  }

  /**
   * Request held by each worker, in worker order (undefined when idle).
   */
  get inFlightRequests(): ReadonlyArray<Request | undefined> {
    return this.workers.map((worker) =>
      worker.state.kind === 'busy' ? worker.state.request : undefined
    );
  }

  /**
   * Advance the simulation by exactly one tick.
   *
   * @example
   * ```typescript
   * const summary = sim.step();
   * console.log(`tick ${summary.tick}: ${summary.failures} failures`);
   * ```
   */
  step(): TickSummary {
    const tick = this.currentTick;
    const failures: PendingFailure[] = [];

    // Requests that are waiting in the queue are one tick closer to doom
    this.queue.ageAll();

    this.arrivals.accumulate();
    const arrivals = this.arrivals.drain(() => this.admit(tick, failures));

    let completed = 0;
    for (const worker of this.workers) {
      const outcome = worker.tick(this.queue);
      if (outcome.kind === 'dispatched') {
        this.stats.recordSample('queue-wait-ticks', tick - outcome.request.createdAt);
      } else if (outcome.kind === 'completed') {
        completed++;
        this.stats.increment('requests-completed');
        if (outcome.request.isTimedOut) {
          // The client already gave up while the server kept working on it
          failures.push({ request: outcome.request, cause: 'timed-out' });
        }
      }
    }

    let retriesInjected = 0;
    for (const failure of failures) {
      if (this.recordFailure(tick, failure)) {
        retriesInjected++;
      }
    }

    const busyWorkers = this.workers.reduce(
      (busy, worker) => (worker.isIdle ? busy : busy + 1),
      0
    );
    this.stats.recordValue('queue-length', this.queue.length);
    this.stats.recordValue('busy-workers', busyWorkers);

    this.currentTick++;

    const summary: TickSummary = {
      tick,
      arrivals,
      completed,
      failures: failures.length,
      retriesInjected,
      queueLength: this.queue.length,
      busyWorkers,
    };
    this.emit('tick', summary);
    return summary;
  }

  /**
   * Run until `simulationTicks` ticks have elapsed. Calling it again after
   * completion returns the result without advancing.
   *
   * @throws {Error} If called while the simulation is already running
   */
  run(): SimulationResult {
    if (this.isRunning) {
      throw new Error('Simulation is already running');
    }

    this.isRunning = true;
    this.log('Simulation run started', { until: this.parameters.simulationTicks });

    try {
      while (this.currentTick < this.parameters.simulationTicks) {
        this.step();
      }

      const result = this.result();
      this.log('Simulation run completed', {
        totalRequests: result.totalRequests,
        failedRequests: result.failedRequests,
        failureRate: result.failureRate,
      });
      this.emit('complete', result);
      return result;
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * Summary of the run so far.
   */
  result(): SimulationResult {
    const workers = this.parameters.workers;
    return {
      ticks: this.currentTick,
      totalRequests: this.totalRequests,
      failedRequests: this.failedRequests,
      completedRequests: this.stats.getCount('requests-completed'),
      rejectedRequests: this.stats.getCount('requests-rejected'),
      timedOutRequests: this.stats.getCount('requests-timed-out'),
      retriedRequests: this.stats.getCount('requests-retried'),
      spikedRequests: this.stats.getCount('requests-spiked'),
      failureRate: failureRate(this.failedRequests, this.totalRequests),
      averageQueueLength: this.stats.getAverage('queue-length'),
      peakQueueLength: this.stats.getPeak('queue-length'),
      utilization: workers === 0 ? 0 : this.stats.getAverage('busy-workers') / workers,
      statistics: this.stats.toJSON(),
    };
  }

  /**
   * Register an event handler.
   *
   * @example
   * ```typescript
   * sim.on('failure', (failure) => {
   *   console.log(`request ${failure.requestId} ${failure.cause} at tick ${failure.tick}`);
   * });
   * ```
   */
  on<K extends keyof SimulationEventMap>(
    event: K,
    handler: EventHandler<SimulationEventMap[K]>
  ): void {
    this.handlers[event].add(handler);
  }

  /**
   * Unregister an event handler (must be the same reference as registered).
   */
  off<K extends keyof SimulationEventMap>(
    event: K,
    handler: EventHandler<SimulationEventMap[K]>
  ): void {
    this.handlers[event].delete(handler);
  }

  /**
   * Create one request and decide its fate: idle worker, queue, or failure.
   */
  private admit(tick: number, failures: PendingFailure[]): void {
    const request = this.createRequest(tick);

    const idleWorker = this.workers.find((worker) => worker.isIdle);
    if (idleWorker) {
      idleWorker.assign(request);
    } else if (!this.queue.offer(request)) {
      // Queue is full and all workers busy
      failures.push({ request, cause: 'rejected' });
    }
  }

  private createRequest(tick: number): Request {
    const mean = this.parameters.meanLatency;
    // Normal distribution can produce negative results
    let workTicks = Math.max(0, this.random.normal(mean, mean / 4));
    this.stats.recordSample('sampled-latency', workTicks);

    if (this.spikeRequestsRemaining > 0) {
      this.spikeRequestsRemaining--;
      workTicks *= 10;
      this.stats.increment('requests-spiked');
      if (this.spikeRequestsRemaining === 0) {
        this.log('Latency spike window exhausted');
      }
    }

    const request = new Request(
      this.totalRequests,
      Math.trunc(workTicks),
      this.parameters.timeout,
      tick
    );
    this.totalRequests++;
    this.stats.increment('requests-total');
    return request;
  }

  /**
   * @returns true if a retry was injected
   */
  private recordFailure(tick: number, failure: PendingFailure): boolean {
    this.failedRequests++;
    this.stats.increment('requests-failed');
    this.stats.increment(
      failure.cause === 'rejected' ? 'requests-rejected' : 'requests-timed-out'
    );

    const retried = this.random.bernoulli(this.parameters.retryProbability);
    if (retried) {
      this.arrivals.reinject();
      this.stats.increment('requests-retried');
    }

    this.emit('failure', {
      tick,
      requestId: failure.request.id,
      cause: failure.cause,
      retried,
    });
    return retried;
  }

  private emit<K extends keyof SimulationEventMap>(
    event: K,
    payload: SimulationEventMap[K]
  ): void {
    for (const handler of this.handlers[event]) {
      handler(payload);
    }
  }

  /**
   * Log a message if logging is enabled.
   */
  private log(message: string, data?: unknown): void {
    if (this.enableLogging) {
      console.log(`[Simulation @ ${this.currentTick}] ${message}`, data ?? '');
    }
  }
}
