import { describe, it, expect } from 'vitest';
import {
  ValidationError,
  validateCount,
  validateProbability,
  validatePositive,
} from '../../src/utils/validation.js';
import { validateQueueDiscipline } from '../../src/types/queue-discipline.js';

describe('Input Validation', () => {
  describe('ValidationError', () => {
    it('should be instanceable and include context', () => {
      const error = new ValidationError('Test error', { value: 42 });
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ValidationError');
      expect(error.message).toBe('Test error');
      expect(error.context).toEqual({ value: 42 });
    });
  });

  it('should append extra context to messages', () => {
    expect(() => validatePositive(0, 'rate', 'Rate drives arrivals')).toThrow(
      'rate must be positive (got 0). Rate drives arrivals'
    );
  });

  it('should accept zero as a count', () => {
    expect(() => validateCount(0, 'workers')).not.toThrow();
  });

  it('should accept the probability bounds', () => {
    expect(() => validateProbability(0, 'p')).not.toThrow();
    expect(() => validateProbability(1, 'p')).not.toThrow();
    expect(() => validateProbability(Number.NaN, 'p')).toThrow('p must be a finite number (got NaN)');
  });

  describe('queue discipline', () => {
    it('should accept fifo and lifo', () => {
      expect(validateQueueDiscipline('fifo')).toBe('fifo');
      expect(validateQueueDiscipline('lifo')).toBe('lifo');
    });

    it('should reject anything else', () => {
      expect(() => validateQueueDiscipline('priority')).toThrow(
        'Invalid queue discipline: priority. Must be one of: fifo, lifo'
      );
    });
  });
});
