/**
 * Percentage of created requests that failed.
 *
 * @returns `failed / total * 100`, or null when no request was ever created
 */
export function failureRate(failedRequests: number, totalRequests: number): number | null {
  if (totalRequests === 0) {
    return null;
  }
  return (failedRequests / totalRequests) * 100;
}

/**
 * Render the one-line run summary.
 *
 * @example
 * ```typescript
 * formatFailureRate(12.3456); // "Failure rate: 12.35%"
 * formatFailureRate(null);    // "Failure rate: N/A (no requests)"
 * ```
 */
export function formatFailureRate(rate: number | null): string {
  if (rate === null) {
    return 'Failure rate: N/A (no requests)';
  }
  return `Failure rate: ${rate.toFixed(2)}%`;
}
