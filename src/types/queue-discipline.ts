/**
 * Queue discipline types for the request queue.
 * Determines which waiting request a free worker takes next.
 */

import { ValidationError } from '../utils/validation.js';

/**
 * Queue discipline enumeration
 */
export type QueueDiscipline =
  | 'fifo' // First In First Out (default)
  | 'lifo'; // Last In First Out

const VALID_DISCIPLINES: readonly QueueDiscipline[] = ['fifo', 'lifo'];

/**
 * Get the default queue discipline
 */
export function getDefaultQueueDiscipline(): QueueDiscipline {
  return 'fifo';
}

/**
 * Validate a queue discipline coming from untyped input (CLI, JSON)
 */
export function validateQueueDiscipline(discipline: string): QueueDiscipline {
  const match = VALID_DISCIPLINES.find((valid) => valid === discipline);
  if (match === undefined) {
    throw new ValidationError(
      `Invalid queue discipline: ${discipline}. Must be one of: ${VALID_DISCIPLINES.join(', ')}`,
      { discipline }
    );
  }
  return match;
}
