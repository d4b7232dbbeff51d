import { describe, it, expect } from 'vitest';
import { RequestQueue } from '../../src/core/RequestQueue.js';
import { Request } from '../../src/core/Request.js';
import { ValidationError } from '../../src/utils/validation.js';

function requests(count: number): Request[] {
  return Array.from({ length: count }, (_, id) => new Request(id, 10, 10, 0));
}

describe('RequestQueue', () => {
  it('should default to fifo', () => {
    const queue = new RequestQueue(3);
    expect(queue.discipline).toBe('fifo');
    expect(queue.isEmpty).toBe(true);
  });

  it('should reject invalid capacities', () => {
    expect(() => new RequestQueue(-1)).toThrow(ValidationError);
    expect(() => new RequestQueue(1.5)).toThrow('capacity must be an integer (got 1.5)');
  });

  it('should refuse offers once full', () => {
    const queue = new RequestQueue(2);
    expect(queue.offer(new Request(0, 1, 1, 0))).toBe(true);
    expect(queue.offer(new Request(1, 1, 1, 0))).toBe(true);
    expect(queue.isFull).toBe(true);
    expect(queue.offer(new Request(2, 1, 1, 0))).toBe(false);
    expect(queue.length).toBe(2);
  });

  it('should treat a zero-capacity queue as always full', () => {
    const queue = new RequestQueue(0);
    expect(queue.isFull).toBe(true);
    expect(queue.offer(new Request(0, 1, 1, 0))).toBe(false);
    expect(queue.length).toBe(0);
  });

  it('should serve the oldest request first under fifo', () => {
    const queue = new RequestQueue(5, { discipline: 'fifo' });
    for (const request of requests(3)) {
      queue.offer(request);
    }
    expect(queue.take()?.id).toBe(0);
    expect(queue.take()?.id).toBe(1);
    expect(queue.take()?.id).toBe(2);
    expect(queue.take()).toBeUndefined();
  });

  it('should serve the newest request first under lifo', () => {
    const queue = new RequestQueue(5, { discipline: 'lifo' });
    for (const request of requests(3)) {
      queue.offer(request);
    }
    expect(queue.take()?.id).toBe(2);
    expect(queue.take()?.id).toBe(1);
    expect(queue.take()?.id).toBe(0);
    expect(queue.take()).toBeUndefined();
  });

  it('should age every waiting request without evicting timed out ones', () => {
    const queue = new RequestQueue(5);
    queue.offer(new Request(0, 4, 1, 0));
    queue.offer(new Request(1, 4, 3, 0));

    queue.ageAll();
    queue.ageAll();

    const waiting = queue.toArray();
    expect(waiting.map((r) => r.remainingTimeoutTicks)).toEqual([0, 1]);
    expect(waiting.map((r) => r.remainingWorkTicks)).toEqual([4, 4]);
    expect(queue.length).toBe(2);
  });
});
