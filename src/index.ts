// Simulation engine
export { Simulation } from './core/Simulation.js';
export type {
  SimulationOptions,
  SimulationState,
  SimulationResult,
  SimulationEventMap,
  TickSummary,
  FailureEvent,
  FailureCause,
} from './core/Simulation.js';

// Building blocks
export { Request } from './core/Request.js';
export { Worker } from './core/Worker.js';
export type { WorkerState, WorkerTickOutcome } from './core/Worker.js';
export { RequestQueue } from './core/RequestQueue.js';
export type { RequestQueueOptions } from './core/RequestQueue.js';
export { ArrivalProcess } from './core/ArrivalProcess.js';

// Queue disciplines
export {
  getDefaultQueueDiscipline,
  validateQueueDiscipline,
} from './types/queue-discipline.js';
export type { QueueDiscipline } from './types/queue-discipline.js';

// Parameters
export { DEFAULT_PARAMETERS, resolveParameters } from './config/parameters.js';
export type {
  SimulationParameters,
  SimulationParametersInput,
} from './config/parameters.js';

// Statistics collection
export { Statistics } from './statistics/Statistics.js';
export type {
  Clock,
  SampleSummary,
  StatisticsSnapshot,
} from './statistics/Statistics.js';
export { failureRate, formatFailureRate } from './statistics/report.js';

// Random number generation
export { Random } from './random/Random.js';
export type { RandomSource } from './random/Random.js';

// Validation utilities
export { ValidationError } from './utils/validation.js';
