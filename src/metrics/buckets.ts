/**
 * Bucket layout generators for histograms.
 */

import { InvalidValueError } from '../errors';

/**
 * `count` buckets starting at `start`, each `width` wider than the last.
 *
 * @example
 * linearBuckets(0.1, 0.1, 3)  // [0.1, 0.2, 0.30000000000000004]
 */
export function linearBuckets(start: number, width: number, count: number): number[] {
  requireCount(count);
  if (!Number.isFinite(start) || !Number.isFinite(width) || width <= 0) {
    throw new InvalidValueError(
      `linearBuckets needs a finite start and a positive finite width (start ${start}, width ${width})`
    );
  }

  const buckets: number[] = [];
  for (let i = 0; i < count; i++) {
    buckets.push(start + i * width);
  }
  return buckets;
}

/**
 * `count` buckets starting at `start`, each `factor` times the last.
 *
 * @example
 * exponentialBuckets(0.001, 10, 4)  // [0.001, 0.01, 0.1, 1]
 */
export function exponentialBuckets(start: number, factor: number, count: number): number[] {
  requireCount(count);
  if (!Number.isFinite(start) || start <= 0) {
    throw new InvalidValueError(`exponentialBuckets needs a positive start, got ${start}`);
  }
  if (!Number.isFinite(factor) || factor <= 1) {
    throw new InvalidValueError(`exponentialBuckets needs a factor greater than 1, got ${factor}`);
  }

  const buckets: number[] = [];
  let bound = start;
  for (let i = 0; i < count; i++) {
    buckets.push(bound);
    bound *= factor;
  }
  return buckets;
}

function requireCount(count: number): void {
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidValueError(`Bucket count must be a positive integer, got ${count}`);
  }
}
