import type { Request } from './Request.js';
import { validateCount } from '../utils/validation.js';
import {
  type QueueDiscipline,
  getDefaultQueueDiscipline,
} from '../types/queue-discipline.js';

/**
 * Configuration options for a request queue
 */
export interface RequestQueueOptions {
  /** Which end workers take from (default: 'fifo') */
  discipline?: QueueDiscipline;
}

/**
 * Bounded double-ended buffer of requests waiting for a worker.
 *
 * Requests always join at the back. FIFO hands out the front (oldest),
 * LIFO the back (newest). Waiting requests are never evicted, even after
 * their timeout counter reaches zero.
 *
 * @example
 * ```typescript
 * const queue = new RequestQueue(100, { discipline: 'lifo' });
 * if (!queue.offer(request)) {
 *   // queue full, request rejected
 * }
 * const next = queue.take(); // newest waiting request, or undefined
 * ```
 */
export class RequestQueue {
  private readonly items: Request[] = [];
  private readonly _discipline: QueueDiscipline;

  constructor(
    public readonly capacity: number,
    options: RequestQueueOptions = {}
  ) {
    validateCount(capacity, 'capacity');
    this._discipline = options.discipline ?? getDefaultQueueDiscipline();
  }

  get discipline(): QueueDiscipline {
    return this._discipline;
  }

  get length(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Append a request at the back.
   *
   * @returns false (and leaves the queue untouched) if the queue is full
   */
  offer(request: Request): boolean {
    if (this.isFull) {
      return false;
    }
    this.items.push(request);
    return true;
  }

  /**
   * Remove the next request according to the discipline.
   */
  take(): Request | undefined {
    return this._discipline === 'lifo' ? this.items.pop() : this.items.shift();
  }

  /**
   * Age every waiting request by one tick.
   */
  ageAll(): void {
    for (const request of this.items) {
      request.waitingTick();
    }
  }

  /**
   * Waiting requests from front to back. Read-only view for inspection.
   */
  toArray(): readonly Request[] {
    return [...this.items];
  }
}
