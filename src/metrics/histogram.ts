/**
 * Prometheus Metrics - Histogram Implementation
 *
 * Histogram samples observations and counts them in configurable buckets.
 * Use for: request durations, response sizes, latency distributions.
 *
 * Histogram buckets are cumulative: each bucket counts all observations
 * less than or equal to its upper bound.
 */

import {
  DEFAULT_LATENCY_BUCKETS,
  HistogramMetricFamily,
  HistogramOptions,
  HistogramValue,
  Labels,
  MetricType,
} from '../types';
import { InvalidValueError } from '../errors';
import { MetricFamilyBase } from './family';
import { startTimer, timeWork } from './timing';

/**
 * One histogram series. Maintains bucket counts, sum, and total count.
 *
 * `observe` updates every field in one synchronous step and `snapshot`
 * copies them in one synchronous step, so a collection never sees a count
 * without its buckets and sum.
 */
export class HistogramChild {
  private readonly bucketCounts: number[];
  private sum: number = 0;
  private count: number = 0;

  /**
   * @param upperBounds - Validated finite bounds; +Inf is implicit
   */
  constructor(
    private readonly metricName: string,
    private readonly upperBounds: readonly number[]
  ) {
    this.bucketCounts = new Array<number>(upperBounds.length + 1).fill(0);
  }

  /**
   * Observe a value (record a measurement).
   * NaN is accepted: it reaches sum, count and the +Inf bucket only.
   *
   * @throws InvalidValueError if value is not a number
   */
  observe(value: number): void {
    if (typeof value !== 'number') {
      throw new InvalidValueError(
        `Histogram "${this.metricName}" observation must be a number, got ${typeof value}`,
        { metricName: this.metricName }
      );
    }

    for (let i = 0; i < this.upperBounds.length; i++) {
      if (value <= this.upperBounds[i]) {
        this.bucketCounts[i]++;
      }
    }
    this.bucketCounts[this.upperBounds.length]++;

    this.sum += value;
    this.count++;
  }

  /**
   * Run `work` and observe its duration in seconds, whether it returns or throws.
   */
  track<T>(work: () => T): T {
    return timeWork(work, (seconds) => this.observe(seconds));
  }

  /**
   * Start a timer, returns function to observe duration on completion.
   *
   * @example
   * const end = histogram.startTimer();
   * // ... do work ...
   * const duration = end(); // Observes duration and returns it
   */
  startTimer(): () => number {
    return startTimer((seconds) => this.observe(seconds));
  }

  getSum(): number {
    return this.sum;
  }

  getCount(): number {
    return this.count;
  }

  /**
   * Cumulative bucket counts, the last entry being +Inf.
   */
  getBucketCounts(): number[] {
    return [...this.bucketCounts];
  }

  snapshot(labels: Labels): HistogramValue {
    return {
      labels,
      buckets: this.bucketCounts.map((count, i) => ({
        le: i < this.upperBounds.length ? this.upperBounds[i] : Infinity,
        count,
      })),
      sum: this.sum,
      count: this.count,
    };
  }
}

/**
 * Histogram family.
 *
 * @example
 * const latency = new Histogram({
 *   name: 'request_duration_seconds',
 *   help: 'Request duration',
 *   buckets: [0.1, 0.5, 1],
 * });
 * await latency.track(() => handle(request));
 */
export class Histogram extends MetricFamilyBase<HistogramChild> {
  readonly type = MetricType.Histogram;
  /** Finite upper bounds, ascending; +Inf is implicit */
  readonly buckets: readonly number[];

  constructor(options: HistogramOptions) {
    const buckets = validateBuckets(options.name, options.buckets ?? DEFAULT_LATENCY_BUCKETS);
    super(options, () => new HistogramChild(options.name, buckets));
    this.buckets = buckets;
  }

  observe(value: number): void {
    this.unlabeledChild().observe(value);
  }

  track<T>(work: () => T): T {
    return this.unlabeledChild().track(work);
  }

  startTimer(): () => number {
    return this.unlabeledChild().startTimer();
  }

  collect(): HistogramMetricFamily[] {
    return [
      {
        name: this.name,
        help: this.help,
        type: this.type,
        labelNames: this.labelNames,
        metrics: this.series().map(({ labels, child }) => child.snapshot(labels.toRecord())),
      },
    ];
  }
}

/**
 * Checks a bucket layout and returns a frozen copy.
 *
 * @throws InvalidValueError unless the bounds are non-empty, finite and strictly increasing
 */
export function validateBuckets(metricName: string, buckets: readonly number[]): readonly number[] {
  if (buckets.length === 0) {
    throw new InvalidValueError(`Histogram "${metricName}" needs at least one bucket`, {
      metricName,
    });
  }

  for (let i = 0; i < buckets.length; i++) {
    const bound = buckets[i];
    if (typeof bound !== 'number' || Number.isNaN(bound)) {
      throw new InvalidValueError(`Histogram "${metricName}" bucket ${i} is not a number`, {
        metricName,
      });
    }
    if (bound === Infinity) {
      throw new InvalidValueError(
        `Histogram "${metricName}" must not declare the +Inf bucket; it is always added`,
        { metricName }
      );
    }
    if (bound === -Infinity) {
      throw new InvalidValueError(`Histogram "${metricName}" bucket ${i} is -Inf`, { metricName });
    }
    if (i > 0 && bound <= buckets[i - 1]) {
      throw new InvalidValueError(
        `Histogram "${metricName}" buckets must be strictly increasing (${buckets[i - 1]} >= ${bound})`,
        { metricName }
      );
    }
  }

  return Object.freeze([...buckets]);
}
