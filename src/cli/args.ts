import { parseArgs } from 'node:util';
import { ValidationError } from '../utils/validation.js';
import {
  DEFAULT_PARAMETERS,
  type SimulationParametersInput,
} from '../config/parameters.js';

export const HELP_TEXT = [
  'congestion-sim',
  '',
  'Simulates a bounded request queue served by a fixed worker pool and',
  'prints the share of requests that failed.',
  '',
  'Options:',
  '  -r, --arrival_rate R        mean new requests per tick, > 0 (required)',
  `  -w, --workers N             number of workers (default: ${DEFAULT_PARAMETERS.workers})`,
  `  -t, --timeout TICKS         ticks before a request times out (default: ${DEFAULT_PARAMETERS.timeout})`,
  `      --mean_latency TICKS    mean processing latency, > 0 (default: ${DEFAULT_PARAMETERS.meanLatency})`,
  `      --simulation_time TICKS number of ticks to simulate (default: ${DEFAULT_PARAMETERS.simulationTicks})`,
  `  -q, --queue_size N          request queue capacity (default: ${DEFAULT_PARAMETERS.queueSize})`,
  '      --lifo                  serve the newest waiting request first',
  '      --simulate_spike        10x latency for the first simulation_time/1000 requests',
  `      --retry_probability P   chance a failed request is retried, 0..1 (default: ${DEFAULT_PARAMETERS.retryProbability})`,
  '  -h, --help                  show this help',
  '',
  'Set CONGESTION_SIM_LOG=1 to print debug log lines.',
].join('\n');

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; parameters: SimulationParametersInput };

function parseNumber(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new ValidationError(`--${flag} must be a number (got '${raw}')`, {
      [flag]: raw,
    });
  }
  return value;
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        arrival_rate: { type: 'string', short: 'r' },
        workers: { type: 'string', short: 'w' },
        timeout: { type: 'string', short: 't' },
        mean_latency: { type: 'string' },
        simulation_time: { type: 'string' },
        queue_size: { type: 'string', short: 'q' },
        lifo: { type: 'boolean' },
        simulate_spike: { type: 'boolean' },
        retry_probability: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(message, { argv: [...argv] });
  }
}

/**
 * Turn command-line arguments into simulation parameters. Range checks are
 * left to resolveParameters().
 *
 * @throws {ValidationError} On unknown flags, missing values or non-numeric input
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const values = readFlags(argv);

  if (values.help) {
    return { kind: 'help' };
  }

  const arrivalRate = parseNumber(values.arrival_rate, 'arrival_rate');
  if (arrivalRate === undefined) {
    throw new ValidationError('--arrival_rate is required', { argv: [...argv] });
  }

  return {
    kind: 'run',
    parameters: {
      arrivalRate,
      workers: parseNumber(values.workers, 'workers'),
      timeout: parseNumber(values.timeout, 'timeout'),
      meanLatency: parseNumber(values.mean_latency, 'mean_latency'),
      simulationTicks: parseNumber(values.simulation_time, 'simulation_time'),
      queueSize: parseNumber(values.queue_size, 'queue_size'),
      discipline: values.lifo ? 'lifo' : 'fifo',
      simulateSpike: values.simulate_spike ?? false,
      retryProbability: parseNumber(values.retry_probability, 'retry_probability'),
    },
  };
}
