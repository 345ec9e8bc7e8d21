/**
 * Metrics registry.
 *
 * Owns the name-to-collector catalog, applies registry-wide default labels
 * at collection time and feeds series counts to the cardinality monitor.
 */

import { MetricType, type Labels, type MetricFamily, type RegistrySnapshot } from '../types';
import { DuplicateNameError, UnknownCollectorError } from '../errors';
import { resolveRegistryConfig, type RegistryConfig, type RegistryOptions } from '../config';
import type { Logger } from '../observability/logging';
import { createSerializer, type OutputFormat } from '../serialization';
import { isCardinalitySource, type Collector } from '../metrics/traits';
import { CardinalityMonitor, type CardinalityStats } from './cardinality';

/**
 * Central catalog of collectors.
 *
 * Each metric name belongs to exactly one registered collector. Registering
 * the same collector twice is a no-op; a different collector claiming a
 * taken name is rejected, even when its shape is identical. Use
 * `getOrCreateCounter` and friends to share one family between call sites.
 *
 * @example
 * const registry = new MetricsRegistry({ defaultLabels: { service: 'api' } });
 * const requests = new Counter({ name: 'requests_total', help: 'Requests' }).register(registry);
 * requests.inc();
 * registry.metrics();
 */
export class MetricsRegistry {
  /** Registration order is collection order */
  private readonly collectors: Map<Collector, readonly string[]> = new Map();
  private readonly owners: Map<string, Collector> = new Map();
  private readonly config: RegistryConfig;
  private readonly logger: Logger;
  private readonly cardinality: CardinalityMonitor;

  constructor(options: RegistryOptions = {}) {
    this.config = resolveRegistryConfig(options);
    this.logger = this.config.logger.child({ component: 'metrics-registry' });
    this.cardinality = new CardinalityMonitor(
      this.logger,
      this.config.cardinalityWarningLimit,
      this.config.cardinalityWarningLimits
    );
  }

  /**
   * Register a collector. Every name it describes is checked before any is claimed.
   *
   * @returns the collector, for chaining
   * @throws DuplicateNameError if another collector owns one of its names,
   *   or if it describes the same name twice
   */
  register<T extends Collector>(collector: T): T {
    if (this.collectors.has(collector)) {
      return collector;
    }

    const names = collector.describe().map((description) => description.name);
    const seen = new Set<string>();
    for (const name of names) {
      if (seen.has(name)) {
        throw new DuplicateNameError(name, 'collector describes this name more than once');
      }
      seen.add(name);
      if (this.owners.has(name)) {
        throw new DuplicateNameError(name);
      }
    }

    this.collectors.set(collector, names);
    for (const name of names) {
      this.owners.set(name, collector);
    }
    this.logger.debug('Registered collector', { names });

    return collector;
  }

  /**
   * Remove a collector; later collections omit its families.
   *
   * @throws UnknownCollectorError if the collector is not registered here
   */
  unregister(collector: Collector): void {
    const names = this.collectors.get(collector);
    if (names === undefined) {
      const [description] = collector.describe();
      throw new UnknownCollectorError(description?.name ?? '(unnamed collector)');
    }

    this.collectors.delete(collector);
    for (const name of names) {
      this.owners.delete(name);
      this.cardinality.reset(name);
    }
    this.logger.debug('Unregistered collector', { names });
  }

  /**
   * Collector that owns `name`.
   *
   * @throws UnknownCollectorError if no collector owns it
   */
  getCollector(name: string): Collector {
    const collector = this.owners.get(name);
    if (collector === undefined) {
      throw new UnknownCollectorError(name);
    }
    return collector;
  }

  has(name: string): boolean {
    return this.owners.has(name);
  }

  /**
   * Names of every registered family, in registration order.
   */
  getNames(): string[] {
    return [...this.collectors.values()].flat();
  }

  /**
   * Point-in-time snapshot of every registered family, in registration order.
   * Errors thrown by a collector propagate to the caller.
   */
  collect(): RegistrySnapshot {
    const families: MetricFamily[] = [];

    // Copy first: an unregister during traversal removes a whole collector or nothing.
    for (const collector of [...this.collectors.keys()]) {
      if (isCardinalitySource(collector)) {
        this.cardinality.observe(collector.name, collector.getCardinality());
      }
      for (const family of collector.collect()) {
        families.push(this.withDefaultLabels(family));
      }
    }

    return families;
  }

  /**
   * Collect and serialize in one step.
   */
  metrics(format: OutputFormat = 'prometheus'): string {
    return createSerializer(format).serialize(this.collect());
  }

  /**
   * Series counts seen at the last collection.
   */
  getCardinalityStats(): Map<string, CardinalityStats> {
    return this.cardinality.getStats();
  }

  /**
   * Drop every collector.
   */
  clear(): void {
    this.collectors.clear();
    this.owners.clear();
    this.cardinality.reset();
  }

  private withDefaultLabels(family: MetricFamily): MetricFamily {
    const defaults = Object.entries(this.config.defaultLabels);
    if (defaults.length === 0) {
      return family;
    }

    // A sample's own labels win over a default of the same name.
    const extend = (labels: Readonly<Labels>): Labels => {
      const extended: Labels = { ...labels };
      for (const [name, value] of defaults) {
        if (!Object.hasOwn(extended, name)) {
          extended[name] = value;
        }
      }
      return extended;
    };

    if (family.type === MetricType.Histogram) {
      return {
        ...family,
        metrics: family.metrics.map((metric) => ({ ...metric, labels: extend(metric.labels) })),
      };
    }
    return {
      ...family,
      metrics: family.metrics.map((metric) => ({ ...metric, labels: extend(metric.labels) })),
    };
  }
}
