/**
 * Tests for Histogram.
 */

import { describe, it, expect } from 'vitest';
import { Histogram, validateBuckets } from '../histogram';
import { InvalidValueError, InvalidNameError } from '../../errors';
import { DEFAULT_LATENCY_BUCKETS, MetricType } from '../../types';

describe('Histogram', () => {
  const newHistogram = () =>
    new Histogram({ name: 'request_duration_seconds', help: 'Duration', buckets: [0.1, 0.5, 1] });

  describe('observe', () => {
    it('should count a value in every bucket whose bound it does not exceed', () => {
      const histogram = newHistogram();

      histogram.observe(0.3);

      const [family] = histogram.collect();
      expect(family.metrics).toEqual([
        {
          labels: {},
          buckets: [
            { le: 0.1, count: 0 },
            { le: 0.5, count: 1 },
            { le: 1, count: 1 },
            { le: Infinity, count: 1 },
          ],
          sum: 0.3,
          count: 1,
        },
      ]);
    });

    it('should treat a value equal to a bound as inside that bucket', () => {
      const histogram = newHistogram();

      histogram.observe(0.5);

      expect(histogram.labels().getBucketCounts()).toEqual([0, 1, 1, 1]);
    });

    it('should count values above every bound only in +Inf', () => {
      const histogram = newHistogram();

      histogram.observe(2);
      histogram.observe(0.0625);

      const child = histogram.labels();
      expect(child.getBucketCounts()).toEqual([1, 1, 1, 2]);
      expect(child.getSum()).toBe(2.0625);
      expect(child.getCount()).toBe(2);
    });

    it('should keep +Inf equal to count and sum equal to the total observed', () => {
      const histogram = newHistogram();
      const values = [0.25, 4, 0.75, 0.125, 1];

      for (const value of values) {
        histogram.observe(value);
      }

      const child = histogram.labels();
      const counts = child.getBucketCounts();
      expect(counts[counts.length - 1]).toBe(child.getCount());
      expect(child.getCount()).toBe(5);
      expect(child.getSum()).toBe(6.125);
      expect(counts).toEqual([0, 2, 4, 5]);
    });

    it('should accept negative observations', () => {
      const histogram = newHistogram();

      histogram.observe(-1);

      expect(histogram.labels().getBucketCounts()).toEqual([1, 1, 1, 1]);
      expect(histogram.labels().getSum()).toBe(-1);
    });

    it('should put NaN only in +Inf, sum and count', () => {
      const histogram = newHistogram();

      histogram.observe(NaN);

      const child = histogram.labels();
      expect(child.getBucketCounts()).toEqual([0, 0, 0, 1]);
      expect(child.getSum()).toBeNaN();
      expect(child.getCount()).toBe(1);
    });

    it('should reject non-numeric observations', () => {
      const histogram = newHistogram();

      expect(() => Reflect.apply(histogram.observe, histogram, ['0.2'])).toThrow(
        InvalidValueError
      );
      expect(histogram.labels().getCount()).toBe(0);
    });
  });

  describe('timing', () => {
    it('should observe once when tracked work returns', () => {
      const histogram = newHistogram();

      const result = histogram.track(() => 42);

      expect(result).toBe(42);
      expect(histogram.labels().getCount()).toBe(1);
    });

    it('should observe once when tracked work throws', () => {
      const histogram = newHistogram();

      expect(() =>
        histogram.track(() => {
          throw new Error('failed');
        })
      ).toThrow('failed');
      expect(histogram.labels().getCount()).toBe(1);
    });

    it('should observe once an async result settles', async () => {
      const histogram = newHistogram();

      const pending = histogram.track(async () => 'ok');

      await expect(pending).resolves.toBe('ok');
      expect(histogram.labels().getCount()).toBe(1);
    });

    it('should observe the duration returned by startTimer', () => {
      const histogram = newHistogram();

      const end = histogram.startTimer();
      const seconds = end();

      expect(histogram.labels().getSum()).toBe(seconds);
      expect(histogram.labels().getCount()).toBe(1);
    });
  });

  describe('construction', () => {
    it('should use the default latency buckets when none are given', () => {
      const histogram = new Histogram({ name: 'latency_seconds', help: 'Latency' });

      expect(histogram.buckets).toEqual(DEFAULT_LATENCY_BUCKETS);
      expect(histogram.type).toBe(MetricType.Histogram);
    });

    it('should not share state with the bucket array passed in', () => {
      const bounds = [1, 2];
      const histogram = new Histogram({ name: 'size_bytes', help: 'Size', buckets: bounds });

      bounds.push(3);

      expect(histogram.buckets).toEqual([1, 2]);
    });

    it('should reject le as a label name', () => {
      expect(
        () => new Histogram({ name: 'latency_seconds', help: 'Latency', labelNames: ['le'] })
      ).toThrow(InvalidNameError);
    });

    it('should keep labeled series separate', () => {
      const histogram = new Histogram({
        name: 'latency_seconds',
        help: 'Latency',
        labelNames: ['route'],
        buckets: [1],
      });

      histogram.labels('/a').observe(0.5);
      histogram.labels('/b').observe(3);

      const [family] = histogram.collect();
      expect(family.metrics.map((metric) => metric.labels)).toEqual([
        { route: '/a' },
        { route: '/b' },
      ]);
      expect(family.metrics[1].buckets).toEqual([
        { le: 1, count: 0 },
        { le: Infinity, count: 1 },
      ]);
    });
  });
});

describe('validateBuckets', () => {
  it('should return a frozen copy of valid bounds', () => {
    const input = [0.5, 1, 10];
    const result = validateBuckets('latency_seconds', input);

    expect(result).toEqual([0.5, 1, 10]);
    expect(result).not.toBe(input);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('should reject an empty layout', () => {
    expect(() => validateBuckets('latency_seconds', [])).toThrow('needs at least one bucket');
  });

  it('should reject bounds that are not strictly increasing', () => {
    expect(() => validateBuckets('latency_seconds', [1, 1])).toThrow(
      'buckets must be strictly increasing'
    );
    expect(() => validateBuckets('latency_seconds', [2, 1])).toThrow(InvalidValueError);
  });

  it('should reject an explicit +Inf bound', () => {
    expect(() => validateBuckets('latency_seconds', [1, Infinity])).toThrow(
      'must not declare the +Inf bucket'
    );
  });

  it('should reject NaN and -Inf bounds', () => {
    expect(() => validateBuckets('latency_seconds', [NaN])).toThrow('bucket 0 is not a number');
    expect(() => validateBuckets('latency_seconds', [-Infinity, 1])).toThrow('bucket 0 is -Inf');
  });
});
