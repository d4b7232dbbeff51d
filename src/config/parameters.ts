import {
  validateCount,
  validateFinite,
  validatePositive,
  validateProbability,
} from '../utils/validation.js';
import {
  type QueueDiscipline,
  validateQueueDiscipline,
} from '../types/queue-discipline.js';

/**
 * Fully resolved simulation parameters.
 */
export interface SimulationParameters {
  /** Mean number of new requests per tick, must be > 0 */
  arrivalRate: number;
  /** Number of workers serving the queue */
  workers: number;
  /** Ticks before a request is considered failed by its client */
  timeout: number;
  /** Mean processing latency in ticks, must be > 0 */
  meanLatency: number;
  /** Number of ticks to simulate */
  simulationTicks: number;
  /** Capacity of the request queue */
  queueSize: number;
  /** Order in which waiting requests are served */
  discipline: QueueDiscipline;
  /**
   * Multiply the latency of the first `simulationTicks / 1000` created
   * requests by 10. The window counts requests, not ticks.
   */
  simulateSpike: boolean;
  /** Probability that a failed request is tried again */
  retryProbability: number;
}

/**
 * Parameters as accepted from callers: everything but the arrival rate is optional.
 */
export type SimulationParametersInput = Pick<SimulationParameters, 'arrivalRate'> &
  Partial<Omit<SimulationParameters, 'arrivalRate'>>;

export const DEFAULT_PARAMETERS: Readonly<Omit<SimulationParameters, 'arrivalRate'>> = {
  workers: 10,
  timeout: 1000,
  meanLatency: 50,
  simulationTicks: 1_000_000,
  queueSize: 1000,
  discipline: 'fifo',
  simulateSpike: false,
  retryProbability: 0.5,
};

/**
 * Fill in defaults and validate every parameter.
 *
 * @throws {ValidationError} On the first invalid parameter
 *
 * @example
 * ```typescript
 * const params = resolveParameters({ arrivalRate: 0.25, workers: 2 });
 * params.queueSize; // 1000
 * ```
 */
export function resolveParameters(input: SimulationParametersInput): SimulationParameters {
  const params: SimulationParameters = {
    arrivalRate: input.arrivalRate,
    workers: input.workers ?? DEFAULT_PARAMETERS.workers,
    timeout: input.timeout ?? DEFAULT_PARAMETERS.timeout,
    meanLatency: input.meanLatency ?? DEFAULT_PARAMETERS.meanLatency,
    simulationTicks: input.simulationTicks ?? DEFAULT_PARAMETERS.simulationTicks,
    queueSize: input.queueSize ?? DEFAULT_PARAMETERS.queueSize,
    discipline: validateQueueDiscipline(input.discipline ?? DEFAULT_PARAMETERS.discipline),
    simulateSpike: input.simulateSpike ?? DEFAULT_PARAMETERS.simulateSpike,
    retryProbability: input.retryProbability ?? DEFAULT_PARAMETERS.retryProbability,
  };

  validateFinite(params.arrivalRate, 'arrivalRate');
  validatePositive(params.arrivalRate, 'arrivalRate', 'Request arrival rate must be greater than 0');
  validateFinite(params.meanLatency, 'meanLatency');
  validatePositive(params.meanLatency, 'meanLatency', 'Mean request latency must be greater than 0');
  validateProbability(params.retryProbability, 'retryProbability');
  validateCount(params.workers, 'workers');
  validateCount(params.timeout, 'timeout');
  validateCount(params.simulationTicks, 'simulationTicks');
  validateCount(params.queueSize, 'queueSize');

  return params;
}
