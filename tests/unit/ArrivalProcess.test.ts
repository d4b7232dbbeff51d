import { describe, it, expect } from 'vitest';
import { ArrivalProcess } from '../../src/core/ArrivalProcess.js';
import { ValidationError } from '../../src/utils/validation.js';
import { ScriptedRandom } from '../helpers/ScriptedRandom.js';

describe('ArrivalProcess', () => {
  it('should reject a non-positive rate', () => {
    const random = new ScriptedRandom();
    expect(() => new ArrivalProcess(0, random)).toThrow(ValidationError);
    expect(() => new ArrivalProcess(-2, random)).toThrow(
      'arrivalRate must be positive (got -2). Request arrival rate must be greater than 0'
    );
  });

  it('should sample Normal(rate, rate / 4)', () => {
    const random = new ScriptedRandom();
    const arrivals = new ArrivalProcess(8, random);
    expect(arrivals.accumulate()).toBe(8);
    expect(random.calls).toEqual(['normal(8, 2)']);
  });

  it('should drain whole requests while the accumulator is positive', () => {
    const random = new ScriptedRandom({ 2: [2.5] });
    const arrivals = new ArrivalProcess(2, random);
    arrivals.accumulate();

    let admitted = 0;
    expect(arrivals.drain(() => admitted++)).toBe(3);
    expect(admitted).toBe(3);
    expect(arrivals.incomingRequests).toBeCloseTo(-0.5);
  });

  it('should carry fractions across ticks', () => {
    const random = new ScriptedRandom();
    const arrivals = new ArrivalProcess(0.25, random);
    const perTick: number[] = [];

    for (let tick = 0; tick < 8; tick++) {
      arrivals.accumulate();
      perTick.push(arrivals.drain(() => {}));
    }

    expect(perTick).toEqual([1, 0, 0, 0, 1, 0, 0, 0]);
  });

  it('should let negative samples lower the accumulator without emitting', () => {
    const random = new ScriptedRandom({ 1: [-1.5, 3] });
    const arrivals = new ArrivalProcess(1, random);

    arrivals.accumulate();
    expect(arrivals.drain(() => {})).toBe(0);
    expect(arrivals.incomingRequests).toBe(-1.5);

    arrivals.accumulate();
    expect(arrivals.drain(() => {})).toBe(2);
  });

  it('should keep draining requests reinjected during the drain', () => {
    const random = new ScriptedRandom({ 1: [1] });
    const arrivals = new ArrivalProcess(1, random);
    arrivals.accumulate();

    let calls = 0;
    const emitted = arrivals.drain(() => {
      calls++;
      if (calls === 1) {
        arrivals.reinject();
      }
    });

    expect(emitted).toBe(2);
    expect(arrivals.incomingRequests).toBe(0);
  });
});
