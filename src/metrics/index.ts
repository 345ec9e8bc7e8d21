/**
 * Metric implementations: counter, gauge and histogram families,
 * their per-series children, and timing helpers.
 */

export { Counter, CounterChild } from './counter';
export { Gauge, GaugeChild } from './gauge';
export { Histogram, HistogramChild, validateBuckets } from './histogram';
export { linearBuckets, exponentialBuckets } from './buckets';
export { MetricFamilyBase } from './family';
export type { FamilyOptions, Series, LabelValuesInput } from './family';
export { startTimer, timeWork } from './timing';
export { isCardinalitySource } from './traits';
export type { Collector, CollectorDescription, CardinalitySource } from './traits';
