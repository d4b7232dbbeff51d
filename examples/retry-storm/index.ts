/**
 * Retry Storm Example
 *
 * A service that copes comfortably with its steady load suffers a short
 * latency regression. Requests pile up, start missing their deadlines, and
 * the retries of those failures keep the queue saturated long after the
 * regression is over.
 *
 * This example demonstrates:
 * 1. The latency spike switch
 * 2. How retry probability decides whether the system recovers
 * 3. Reproducible results with a seeded random number generator
 */

import { Simulation, formatFailureRate } from '../../src/index.js';

const ARRIVAL_RATE = 0.18; // requests per tick
const WORKERS = 10;
const MEAN_LATENCY = 50; // ticks
const TIMEOUT = 1000; // ticks
const SIMULATION_TICKS = 200_000;
const RANDOM_SEED = 42;

function runScenario(retryProbability: number) {
  const sim = new Simulation({
    arrivalRate: ARRIVAL_RATE,
    workers: WORKERS,
    meanLatency: MEAN_LATENCY,
    timeout: TIMEOUT,
    simulationTicks: SIMULATION_TICKS,
    simulateSpike: true,
    retryProbability,
    randomSeed: RANDOM_SEED,
  });

  return sim.run();
}

function runSimulation() {
  console.log('='.repeat(60));
  console.log('Retry Storm');
  console.log('='.repeat(60));
  console.log(`Arrival rate: ${ARRIVAL_RATE} requests/tick`);
  console.log(`Offered load: ${((ARRIVAL_RATE * MEAN_LATENCY) / WORKERS).toFixed(2)}`);
  console.log(`Spiked requests: ${SIMULATION_TICKS / 1000}`);
  console.log();

  const results = [0, 0.5, 0.9].map((retryProbability) => {
    const result = runScenario(retryProbability);
    console.log(`Retry probability ${retryProbability.toFixed(1)}:`);
    console.log(`  ${formatFailureRate(result.failureRate)}`);
    console.log(`  Requests:        ${result.totalRequests}`);
    console.log(`  Timed out:       ${result.timedOutRequests}`);
    console.log(`  Rejected:        ${result.rejectedRequests}`);
    console.log(`  Retries:         ${result.retriedRequests}`);
    console.log(`  Avg queue:       ${result.averageQueueLength.toFixed(1)}`);
    console.log(`  Utilization:     ${(result.utilization * 100).toFixed(1)}%`);
    console.log();
    return { retryProbability, result };
  });

  return results;
}

runSimulation();

export { runSimulation };
