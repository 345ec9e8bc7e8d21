/**
 * Core type definitions for the metrics core.
 *
 * Defines metric kinds, the immutable snapshot structures produced by a
 * collection pass, and the options accepted by each metric constructor.
 */

/**
 * Label types - key-value pairs for metric dimensions.
 * Key order is significant: it is the order labels are rendered in.
 */
export type Labels = Record<string, string>;

/**
 * Prometheus metric types
 */
export enum MetricType {
  Counter = 'counter',
  Gauge = 'gauge',
  Histogram = 'histogram',
}

/**
 * Sample of a counter or gauge series
 */
export interface MetricValue {
  /** Label key-value pairs identifying this series */
  readonly labels: Readonly<Labels>;
  /** Value at the moment of collection */
  readonly value: number;
}

/**
 * One cumulative histogram bucket
 */
export interface HistogramBucket {
  /** Upper bound (inclusive); the last bucket is always Infinity */
  readonly le: number;
  /** Number of observations less than or equal to `le` */
  readonly count: number;
}

/**
 * Sample of a histogram series
 */
export interface HistogramValue {
  readonly labels: Readonly<Labels>;
  /** Ascending buckets ending with +Inf */
  readonly buckets: readonly HistogramBucket[];
  /** Sum of all observed values */
  readonly sum: number;
  /** Total count of observations */
  readonly count: number;
}

interface MetricFamilyBase {
  /** Metric name (must match [a-zA-Z_:][a-zA-Z0-9_:]*) */
  readonly name: string;
  /** Human-readable help text describing the metric */
  readonly help: string;
  /** Declared label names, in render order */
  readonly labelNames: readonly string[];
}

/**
 * Snapshot of a counter or gauge family
 */
export interface ScalarMetricFamily extends MetricFamilyBase {
  readonly type: MetricType.Counter | MetricType.Gauge;
  readonly metrics: readonly MetricValue[];
}

/**
 * Snapshot of a histogram family
 */
export interface HistogramMetricFamily extends MetricFamilyBase {
  readonly type: MetricType.Histogram;
  readonly metrics: readonly HistogramValue[];
}

/**
 * Metric family snapshot - every series of one metric name at one instant.
 */
export type MetricFamily = ScalarMetricFamily | HistogramMetricFamily;

/**
 * Result of a registry collection pass
 */
export type RegistrySnapshot = readonly MetricFamily[];

/**
 * Options for creating a counter metric
 */
export interface CounterOptions {
  /** Metric name (must match [a-zA-Z_:][a-zA-Z0-9_:]*) */
  name: string;
  /** Help text describing what this counter measures */
  help: string;
  /** Optional label names; fixed for the lifetime of the metric */
  labelNames?: readonly string[];
}

/**
 * Options for creating a gauge metric
 */
export interface GaugeOptions {
  name: string;
  help: string;
  labelNames?: readonly string[];
}

/**
 * Options for creating a histogram metric
 */
export interface HistogramOptions {
  name: string;
  help: string;
  labelNames?: readonly string[];
  /** Finite, strictly increasing upper bounds (default: DEFAULT_LATENCY_BUCKETS) */
  buckets?: readonly number[];
}

/**
 * Default histogram buckets for latency measurements (in seconds)
 *
 * Covers: 5ms, 10ms, 25ms, 50ms, 100ms, 250ms, 500ms, 1s, 2.5s, 5s, 10s
 */
export const DEFAULT_LATENCY_BUCKETS: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1.0, 2.5, 5.0, 10.0,
];
