import { describe, it, expect } from 'vitest';
import { Request } from '../../src/core/Request.js';

describe('Request', () => {
  it('should start with the given counters', () => {
    const request = new Request(7, 5, 20, 3);
    expect(request.id).toBe(7);
    expect(request.createdAt).toBe(3);
    expect(request.remainingWorkTicks).toBe(5);
    expect(request.remainingTimeoutTicks).toBe(20);
    expect(request.isDone).toBe(false);
    expect(request.isTimedOut).toBe(false);
  });

  it('should clamp negative counters to zero', () => {
    const request = new Request(0, -3, -1, 0);
    expect(request.remainingWorkTicks).toBe(0);
    expect(request.remainingTimeoutTicks).toBe(0);
    expect(request.isDone).toBe(true);
    expect(request.isTimedOut).toBe(true);
  });

  describe('waitingTick', () => {
    it('should only age the timeout counter', () => {
      const request = new Request(0, 4, 2, 0);
      request.waitingTick();
      expect(request.remainingTimeoutTicks).toBe(1);
      expect(request.remainingWorkTicks).toBe(4);
    });

    it('should saturate at zero', () => {
      const request = new Request(0, 4, 1, 0);
      request.waitingTick();
      request.waitingTick();
      request.waitingTick();
      expect(request.remainingTimeoutTicks).toBe(0);
      expect(request.isTimedOut).toBe(true);
    });
  });

  describe('workingTick', () => {
    it('should advance both counters', () => {
      const request = new Request(0, 2, 5, 0);
      request.workingTick();
      expect(request.remainingWorkTicks).toBe(1);
      expect(request.remainingTimeoutTicks).toBe(4);
      request.workingTick();
      expect(request.isDone).toBe(true);
      expect(request.isTimedOut).toBe(false);
    });

    it('should keep each counter at zero once reached', () => {
      const request = new Request(0, 1, 3, 0);
      for (let i = 0; i < 5; i++) {
        request.workingTick();
      }
      expect(request.remainingWorkTicks).toBe(0);
      expect(request.remainingTimeoutTicks).toBe(0);
    });

    it('should mark a request finished past its deadline as timed out', () => {
      const request = new Request(0, 3, 2, 0);
      request.workingTick();
      request.workingTick();
      request.workingTick();
      expect(request.isDone).toBe(true);
      expect(request.isTimedOut).toBe(true);
    });
  });
});
