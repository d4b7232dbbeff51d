import type { Request } from './Request.js';
import type { RequestQueue } from './RequestQueue.js';

/**
 * Occupancy of a worker. Exactly one request while busy, none while idle.
 */
export type WorkerState =
  | { readonly kind: 'idle' }
  | { readonly kind: 'busy'; readonly request: Request };

const IDLE: WorkerState = { kind: 'idle' };

/**
 * What happened on a worker during one tick
 */
export type WorkerTickOutcome =
  | { readonly kind: 'completed'; readonly request: Request }
  | { readonly kind: 'working'; readonly request: Request }
  | { readonly kind: 'dispatched'; readonly request: Request }
  | { readonly kind: 'idle' };

/**
 * A single unit of service capacity.
 *
 * Each tick a busy worker advances its request; an idle worker pulls the
 * next waiting request from the queue but does not work on it until the
 * following tick.
 */
export class Worker {
  private _state: WorkerState = IDLE;

  constructor(public readonly index: number) {}

  get state(): WorkerState {
    return this._state;
  }

  get isIdle(): boolean {
    return this._state.kind === 'idle';
  }

  /**
   * Hand a request straight to this worker, bypassing the queue.
   *
   * @throws {Error} If the worker is already busy
   */
  assign(request: Request): void {
    if (this._state.kind === 'busy') {
      throw new Error(
        `Worker ${this.index} is busy with request ${this._state.request.id}; cannot assign request ${request.id}`
      );
    }
    this._state = { kind: 'busy', request };
  }

  /**
   * Spend one tick.
   *
   * A worker that finishes its request stays idle for the rest of the tick;
   * it only pulls from the queue on a tick it starts idle.
   */
  tick(queue: RequestQueue): WorkerTickOutcome {
    const state = this._state;
    switch (state.kind) {
      case 'busy': {
        state.request.workingTick();
        if (state.request.isDone) {
          this._state = IDLE;
          return { kind: 'completed', request: state.request };
        }
        return { kind: 'working', request: state.request };
      }
      case 'idle': {
        // Already aged in the queue this tick, so no working tick here
        const next = queue.take();
        if (next === undefined) {
          return { kind: 'idle' };
        }
        this._state = { kind: 'busy', request: next };
        return { kind: 'dispatched', request: next };
      }
    }
  }
}
