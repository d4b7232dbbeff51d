/**
 * Validation utilities for the congestion simulator.
 * Every helper throws a ValidationError carrying the offending value as context.
 *
 * @example
 * ```typescript
 * import { validatePositive, ValidationError } from 'congestion-sim';
 *
 * try {
 *   validatePositive(0, 'arrivalRate');
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.message); // "arrivalRate must be positive (got 0)"
 *     console.log(error.context); // { arrivalRate: 0 }
 *   }
 * }
 * ```
 */

/**
 * Validation error class with context information.
 *
 * @example
 * ```typescript
 * throw new ValidationError('Value must be positive', { value: -1 });
 * ```
 */
export class ValidationError extends Error {
  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

function withContext(base: string, context?: string): string {
  return context ? `${base}. ${context}` : base;
}

/**
 * Validate that a number is non-negative (>= 0).
 *
 * @throws {ValidationError} If value < 0
 */
export function validateNonNegative(
  value: number,
  paramName: string,
  context?: string
): void {
  if (value < 0) {
    throw new ValidationError(
      withContext(`${paramName} must be non-negative (got ${value})`, context),
      { [paramName]: value }
    );
  }
}

/**
 * Validate that a number is positive (> 0).
 *
 * @throws {ValidationError} If value <= 0
 *
 * @example
 * ```typescript
 * validatePositive(5, 'meanLatency'); // OK
 * validatePositive(0, 'meanLatency'); // Throws ValidationError
 * ```
 */
export function validatePositive(
  value: number,
  paramName: string,
  context?: string
): void {
  if (value <= 0) {
    throw new ValidationError(
      withContext(`${paramName} must be positive (got ${value})`, context),
      { [paramName]: value }
    );
  }
}

/**
 * Validate that a number is finite (not NaN or Infinity).
 *
 * @throws {ValidationError} If value is NaN, Infinity, or -Infinity
 */
export function validateFinite(
  value: number,
  paramName: string,
  context?: string
): void {
  if (!Number.isFinite(value)) {
    throw new ValidationError(
      withContext(`${paramName} must be a finite number (got ${value})`, context),
      { [paramName]: value }
    );
  }
}

/**
 * Validate that a value is a whole number.
 *
 * @throws {ValidationError} If value has a fractional part
 */
export function validateInteger(
  value: number,
  paramName: string,
  context?: string
): void {
  if (!Number.isInteger(value)) {
    throw new ValidationError(
      withContext(`${paramName} must be an integer (got ${value})`, context),
      { [paramName]: value }
    );
  }
}

/**
 * Validate a count-like parameter: finite, whole and >= 0.
 * Used for worker counts, queue sizes and tick counts.
 *
 * @example
 * ```typescript
 * validateCount(10, 'workers'); // OK
 * validateCount(0, 'queueSize'); // OK, an empty queue is allowed
 * validateCount(2.5, 'workers'); // Throws: workers must be an integer
 * ```
 */
export function validateCount(value: number, paramName: string): void {
  validateFinite(value, paramName);
  validateInteger(value, paramName);
  validateNonNegative(value, paramName);
}

/**
 * Validate that a probability lies within [0, 1].
 *
 * @throws {ValidationError} If value is not finite or outside [0, 1]
 *
 * @example
 * ```typescript
 * validateProbability(0.5, 'retryProbability'); // OK
 * validateProbability(1.5, 'retryProbability'); // Throws ValidationError
 * ```
 */
export function validateProbability(
  value: number,
  paramName: string,
  context?: string
): void {
  validateFinite(value, paramName, context);
  if (value < 0 || value > 1) {
    throw new ValidationError(
      withContext(`${paramName} must be between 0 and 1 (got ${value})`, context),
      { [paramName]: value }
    );
  }
}
