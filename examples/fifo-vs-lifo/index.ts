/**
 * FIFO vs LIFO Example
 *
 * Under overload a FIFO queue serves requests that have already been
 * waiting the longest, which are the ones most likely to have timed out.
 * LIFO serves the freshest requests first, so the ones it does finish are
 * still wanted by their clients.
 */

import { Simulation, formatFailureRate, type QueueDiscipline } from '../../src/index.js';

const PARAMETERS = {
  arrivalRate: 0.3,
  workers: 10,
  meanLatency: 50,
  timeout: 500,
  queueSize: 2000,
  simulationTicks: 100_000,
  retryProbability: 0.5,
  randomSeed: 7,
};

function runSimulation() {
  const disciplines: QueueDiscipline[] = ['fifo', 'lifo'];

  for (const discipline of disciplines) {
    const result = new Simulation({ ...PARAMETERS, discipline }).run();
    const wait = result.statistics.samples['queue-wait-ticks'];

    console.log(`${discipline.toUpperCase()}: ${formatFailureRate(result.failureRate)}`);
    console.log(`  Completed:       ${result.completedRequests}`);
    console.log(`  Timed out:       ${result.timedOutRequests}`);
    console.log(`  Mean queue wait: ${(wait?.mean ?? 0).toFixed(1)} ticks`);
    console.log(`  Max queue wait:  ${wait?.max ?? 0} ticks`);
  }
}

runSimulation();

export { runSimulation };
