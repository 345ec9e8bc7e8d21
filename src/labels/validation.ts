/**
 * Metric and label name validation.
 * Implements the identifier rules of the Prometheus data model.
 */

import { InvalidNameError } from '../errors';

const METRIC_NAME_PATTERN = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Label names that callers may not declare. `le` carries histogram
 * bucket bounds in the exposition format.
 */
export const RESERVED_LABEL_NAMES: ReadonlySet<string> = new Set(['le']);

/**
 * Validates a Prometheus metric name.
 * Metric names must match [a-zA-Z_:][a-zA-Z0-9_:]*
 *
 * @example
 * ```typescript
 * isValidMetricName('http_requests_total')  // true
 * isValidMetricName('node_cpu:seconds')     // true
 * isValidMetricName('123_requests')         // false
 * isValidMetricName('requests-total')       // false
 * ```
 */
export function isValidMetricName(name: string): boolean {
  return METRIC_NAME_PATTERN.test(name);
}

/**
 * Validates a Prometheus label name.
 * Label names must match [a-zA-Z_][a-zA-Z0-9_]*; names starting with __
 * are reserved for internal use. Unlike metric names they may not contain
 * colons, which the Prometheus text parser rejects in label names.
 *
 * @example
 * ```typescript
 * isValidLabelName('status')     // true
 * isValidLabelName('__internal') // false
 * isValidLabelName('le')         // true (grammar only, see validateLabelNames)
 * ```
 */
export function isValidLabelName(name: string): boolean {
  return LABEL_NAME_PATTERN.test(name) && !name.startsWith('__');
}

/**
 * Throws InvalidNameError unless `name` is a valid metric name.
 */
export function validateMetricName(name: string): void {
  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidNameError(String(name), 'metric name must be a non-empty string');
  }
  if (!isValidMetricName(name)) {
    throw new InvalidNameError(name, 'metric names must match [a-zA-Z_:][a-zA-Z0-9_:]*');
  }
}

/**
 * Throws InvalidNameError for the first label name that is malformed,
 * reserved, or declared twice.
 */
export function validateLabelNames(labelNames: readonly string[]): void {
  const seen = new Set<string>();

  for (const name of labelNames) {
    if (typeof name !== 'string' || !LABEL_NAME_PATTERN.test(name)) {
      throw new InvalidNameError(String(name), 'label names must match [a-zA-Z_][a-zA-Z0-9_]*');
    }
    if (name.startsWith('__')) {
      throw new InvalidNameError(name, 'label names starting with "__" are reserved');
    }
    if (RESERVED_LABEL_NAMES.has(name)) {
      throw new InvalidNameError(name, 'label name is reserved for histogram buckets');
    }
    if (seen.has(name)) {
      throw new InvalidNameError(name, 'label name declared more than once');
    }
    seen.add(name);
  }
}
