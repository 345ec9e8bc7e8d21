/**
 * Get-or-create helpers for sharing one family between call sites.
 *
 * Each helper returns the family already registered under the name when its
 * kind, help text and label names (and, for histograms, buckets) match the
 * request, and registers a new family otherwise.
 */

import type { CounterOptions, GaugeOptions, HistogramOptions } from '../types';
import { DEFAULT_LATENCY_BUCKETS } from '../types';
import { DuplicateNameError } from '../errors';
import { Counter } from '../metrics/counter';
import { Gauge } from '../metrics/gauge';
import { Histogram } from '../metrics/histogram';
import { getDefaultRegistry } from './default';
import type { MetricsRegistry } from './registry';

/**
 * @throws DuplicateNameError if the name is registered with a different shape
 */
export function getOrCreateCounter(
  options: CounterOptions,
  registry: MetricsRegistry = getDefaultRegistry()
): Counter {
  if (!registry.has(options.name)) {
    return new Counter(options).register(registry);
  }
  const existing = registry.getCollector(options.name);
  if (existing instanceof Counter && sameShape(existing, options)) {
    return existing;
  }
  throw new DuplicateNameError(options.name, 'registered with a different kind or shape');
}

/**
 * @throws DuplicateNameError if the name is registered with a different shape
 */
export function getOrCreateGauge(
  options: GaugeOptions,
  registry: MetricsRegistry = getDefaultRegistry()
): Gauge {
  if (!registry.has(options.name)) {
    return new Gauge(options).register(registry);
  }
  const existing = registry.getCollector(options.name);
  if (existing instanceof Gauge && sameShape(existing, options)) {
    return existing;
  }
  throw new DuplicateNameError(options.name, 'registered with a different kind or shape');
}

/**
 * @throws DuplicateNameError if the name is registered with a different shape
 */
export function getOrCreateHistogram(
  options: HistogramOptions,
  registry: MetricsRegistry = getDefaultRegistry()
): Histogram {
  if (!registry.has(options.name)) {
    return new Histogram(options).register(registry);
  }
  const existing = registry.getCollector(options.name);
  if (
    existing instanceof Histogram &&
    sameShape(existing, options) &&
    sameValues(existing.buckets, options.buckets ?? DEFAULT_LATENCY_BUCKETS)
  ) {
    return existing;
  }
  throw new DuplicateNameError(options.name, 'registered with a different kind or shape');
}

function sameShape(
  existing: { readonly help: string; readonly labelNames: readonly string[] },
  options: { help: string; labelNames?: readonly string[] | undefined }
): boolean {
  return existing.help === options.help && sameValues(existing.labelNames, options.labelNames ?? []);
}

function sameValues<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}
