/**
 * Prometheus Metrics - Counter Implementation
 *
 * Counter is a monotonically increasing metric.
 * Use for: request counts, errors, task completions, etc.
 */

import { CounterOptions, MetricType, ScalarMetricFamily } from '../types';
import { InvalidValueError } from '../errors';
import { MetricFamilyBase } from './family';

/**
 * One counter series. Can only be incremented.
 */
export class CounterChild {
  private value: number = 0;

  constructor(private readonly metricName: string) {}

  /**
   * Increment counter by `amount`.
   * @param amount - Amount to increment (must be >= 0, default 1)
   * @throws InvalidValueError if amount is negative or not a number
   */
  inc(amount: number = 1): void {
    if (typeof amount !== 'number') {
      throw new InvalidValueError(
        `Counter "${this.metricName}" increment must be a number, got ${typeof amount}`,
        { metricName: this.metricName }
      );
    }
    if (amount < 0) {
      throw new InvalidValueError(
        `Counter "${this.metricName}" cannot be decreased (increment ${amount})`,
        { metricName: this.metricName }
      );
    }
    this.value += amount;
  }

  /**
   * Get current counter value.
   */
  get(): number {
    return this.value;
  }
}

/**
 * Counter family. Unlabeled counters can be incremented directly;
 * labeled ones through {@link Counter.labels}.
 *
 * @example
 * const requests = new Counter({
 *   name: 'http_requests_total',
 *   help: 'Total requests',
 *   labelNames: ['method'],
 * }).register(registry);
 *
 * requests.labels('GET').inc();
 */
export class Counter extends MetricFamilyBase<CounterChild> {
  readonly type = MetricType.Counter;

  constructor(options: CounterOptions) {
    super(options, () => new CounterChild(options.name));
  }

  inc(amount?: number): void {
    this.unlabeledChild().inc(amount);
  }

  get(): number {
    return this.unlabeledChild().get();
  }

  collect(): ScalarMetricFamily[] {
    return [
      {
        name: this.name,
        help: this.help,
        type: this.type,
        labelNames: this.labelNames,
        metrics: this.series().map(({ labels, child }) => ({
          labels: labels.toRecord(),
          value: child.get(),
        })),
      },
    ];
  }
}
