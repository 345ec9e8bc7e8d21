/**
 * Prometheus Metrics - Gauge Implementation
 *
 * Gauge is a metric that can go up and down.
 * Use for: queue depth, in-flight requests, temperatures, last-run timestamps.
 */

import { GaugeOptions, MetricType, ScalarMetricFamily } from '../types';
import { InvalidValueError } from '../errors';
import { MetricFamilyBase } from './family';
import { startTimer, timeWork } from './timing';

/**
 * One gauge series.
 */
export class GaugeChild {
  private value: number = 0;

  constructor(private readonly metricName: string) {}

  /**
   * Set gauge to specific value.
   */
  set(value: number): void {
    this.value = this.requireNumber(value, 'value');
  }

  /**
   * Increment gauge by `amount` (default 1). Negative amounts are allowed.
   */
  inc(amount: number = 1): void {
    this.value += this.requireNumber(amount, 'increment');
  }

  /**
   * Decrement gauge by `amount` (default 1).
   */
  dec(amount: number = 1): void {
    this.value -= this.requireNumber(amount, 'decrement');
  }

  get(): number {
    return this.value;
  }

  /**
   * Set gauge to the current Unix time in seconds.
   */
  setToCurrentTime(): void {
    this.value = Date.now() / 1000;
  }

  /**
   * Run `work` and set the gauge to its duration in seconds, whether it
   * returns or throws. Promises are timed until they settle.
   *
   * @example
   * const rows = gauge.trackDuration(() => loadRows());
   * await gauge.trackDuration(async () => flush());
   */
  trackDuration<T>(work: () => T): T {
    return timeWork(work, (seconds) => this.set(seconds));
  }

  /**
   * Start a timer; the returned function sets the elapsed seconds and returns them.
   */
  startTimer(): () => number {
    return startTimer((seconds) => this.set(seconds));
  }

  private requireNumber(value: number, what: string): number {
    if (typeof value !== 'number') {
      throw new InvalidValueError(
        `Gauge "${this.metricName}" ${what} must be a number, got ${typeof value}`,
        { metricName: this.metricName }
      );
    }
    return value;
  }
}

/**
 * Gauge family. Unlabeled gauges forward every operation to their single series.
 */
export class Gauge extends MetricFamilyBase<GaugeChild> {
  readonly type = MetricType.Gauge;

  constructor(options: GaugeOptions) {
    super(options, () => new GaugeChild(options.name));
  }

  set(value: number): void {
    this.unlabeledChild().set(value);
  }

  inc(amount?: number): void {
    this.unlabeledChild().inc(amount);
  }

  dec(amount?: number): void {
    this.unlabeledChild().dec(amount);
  }

  get(): number {
    return this.unlabeledChild().get();
  }

  setToCurrentTime(): void {
    this.unlabeledChild().setToCurrentTime();
  }

  trackDuration<T>(work: () => T): T {
    return this.unlabeledChild().trackDuration(work);
  }

  startTimer(): () => number {
    return this.unlabeledChild().startTimer();
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
