import { describe, it, expect } from 'vitest';
import { Worker } from '../../src/core/Worker.js';
import { RequestQueue } from '../../src/core/RequestQueue.js';
import { Request } from '../../src/core/Request.js';

describe('Worker', () => {
  it('should start idle', () => {
    const worker = new Worker(0);
    expect(worker.isIdle).toBe(true);
    expect(worker.state).toEqual({ kind: 'idle' });
  });

  it('should hold an assigned request', () => {
    const worker = new Worker(0);
    const request = new Request(1, 2, 10, 0);
    worker.assign(request);
    expect(worker.isIdle).toBe(false);
    expect(worker.state).toEqual({ kind: 'busy', request });
  });

  it('should refuse a second request while busy', () => {
    const worker = new Worker(3);
    worker.assign(new Request(1, 2, 10, 0));
    expect(() => worker.assign(new Request(2, 2, 10, 0))).toThrow(
      'Worker 3 is busy with request 1; cannot assign request 2'
    );
  });

  it('should work on its request and report completion', () => {
    const worker = new Worker(0);
    const queue = new RequestQueue(5);
    const request = new Request(1, 2, 10, 0);
    worker.assign(request);

    expect(worker.tick(queue)).toEqual({ kind: 'working', request });
    expect(request.remainingWorkTicks).toBe(1);
    expect(request.remainingTimeoutTicks).toBe(9);

    expect(worker.tick(queue)).toEqual({ kind: 'completed', request });
    expect(worker.isIdle).toBe(true);
  });

  it('should not pull from the queue on the tick it finishes', () => {
    const worker = new Worker(0);
    const queue = new RequestQueue(5);
    worker.assign(new Request(1, 1, 10, 0));
    queue.offer(new Request(2, 3, 10, 0));

    expect(worker.tick(queue).kind).toBe('completed');
    expect(queue.length).toBe(1);

    const next = worker.tick(queue);
    expect(next.kind).toBe('dispatched');
    expect(queue.length).toBe(0);
  });

  it('should not work on a request on the tick it is dispatched', () => {
    const worker = new Worker(0);
    const queue = new RequestQueue(5);
    const request = new Request(2, 3, 10, 0);
    queue.offer(request);

    expect(worker.tick(queue)).toEqual({ kind: 'dispatched', request });
    expect(request.remainingWorkTicks).toBe(3);
    expect(request.remainingTimeoutTicks).toBe(10);
  });

  it('should stay idle when the queue is empty', () => {
    const worker = new Worker(0);
    expect(worker.tick(new RequestQueue(5))).toEqual({ kind: 'idle' });
    expect(worker.isIdle).toBe(true);
  });
});
