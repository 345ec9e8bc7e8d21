/**
 * Common interfaces for everything a registry can hold.
 */

import type { MetricFamily, MetricType } from '../types';

/**
 * Metadata describing one family a collector produces.
 */
export interface CollectorDescription {
  /** Metric name, unique within a registry */
  readonly name: string;
  readonly help: string;
  readonly type: MetricType;
  readonly labelNames: readonly string[];
}

/**
 * Anything that can be registered: a metric family, or a custom source of
 * families such as the process collector.
 */
export interface Collector {
  /**
   * Describe the families this collector will produce.
   * Used by the registry to enforce name uniqueness at registration time.
   */
  describe(): CollectorDescription[];

  /**
   * Produce a point-in-time snapshot of every family.
   * Called once per scrape.
   */
  collect(): MetricFamily[];
}

/**
 * A collector that can report how many series it holds.
 */
export interface CardinalitySource {
  readonly name: string;
  getCardinality(): number;
}

export function isCardinalitySource(value: object): value is CardinalitySource {
  return (
    'getCardinality' in value &&
    typeof value.getCardinality === 'function' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}
