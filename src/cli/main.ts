import { parseCliArgs, HELP_TEXT } from './args.js';
import { Simulation } from '../core/Simulation.js';
import { formatFailureRate } from '../statistics/report.js';
import { ValidationError } from '../utils/validation.js';

/**
 * Where the CLI writes and what environment it reads.
 */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: Readonly<Record<string, string | undefined>>;
}

const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  env: process.env,
};

function loggingEnabled(env: CliIO['env']): boolean {
  const flag = env.CONGESTION_SIM_LOG?.toLowerCase();
  return flag === '1' || flag === 'true';
}

/**
 * Parse arguments, run one simulation and print the failure rate.
 *
 * @returns Process exit code: 0 on success, 1 on invalid input
 */
export function runCli(argv: readonly string[], io: CliIO = defaultIO): number {
  let simulation: Simulation;
  try {
    const command = parseCliArgs(argv);
    if (command.kind === 'help') {
      io.stdout(HELP_TEXT);
      return 0;
    }
    simulation = new Simulation({
      ...command.parameters,
      enableLogging: loggingEnabled(io.env),
    });
  } catch (error) {
    if (error instanceof ValidationError) {
      io.stderr(`Error: ${error.message}`);
      io.stderr('Run with --help for usage.');
      return 1;
    }
    throw error;
  }

  const result = simulation.run();
  io.stdout(formatFailureRate(result.failureRate));
  return 0;
}
