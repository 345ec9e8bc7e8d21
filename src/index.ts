/**
 * metrics-core
 *
 * In-process Prometheus instrumentation: declare counters, gauges and
 * histograms, update them from application code, and render a snapshot in
 * the Prometheus text exposition format for a scraper to read.
 */

// Re-export types
export * from './types';

// Re-export registry components
export {
  MetricsRegistry,
  getDefaultRegistry,
  setDefaultRegistry,
  resetDefaultRegistry,
  getOrCreateCounter,
  getOrCreateGauge,
  getOrCreateHistogram,
  CardinalityMonitor,
} from './registry';
export type { CardinalityStats } from './registry';

// Re-export metric implementations
export {
  Counter,
  CounterChild,
  Gauge,
  GaugeChild,
  Histogram,
  HistogramChild,
  MetricFamilyBase,
  linearBuckets,
  exponentialBuckets,
  startTimer,
  timeWork,
} from './metrics';
export type { Collector, CollectorDescription, FamilyOptions, LabelValuesInput } from './metrics';

// Re-export serialization components
export {
  PrometheusTextSerializer,
  OpenMetricsSerializer,
  PROMETHEUS_CONTENT_TYPE,
  OPENMETRICS_CONTENT_TYPE,
  createSerializer,
  contentTypeFor,
  escapeHelpText,
  escapeLabelValue,
  formatLabels,
  formatValue,
} from './serialization';
export type { OutputFormat, Serializer } from './serialization';

// Re-export collectors
export { ProcessCollector } from './collectors';
export type { ProcessCollectorConfig, ProcessReadings } from './collectors';

// Re-export configuration
export { resolveRegistryConfig, DEFAULT_CARDINALITY_WARNING_LIMIT } from './config';
export type { RegistryOptions, RegistryConfig } from './config';

// Re-export logging
export {
  ConsoleLogger,
  NoopLogger,
  LogLevel,
  createLogger,
  createNoopLogger,
} from './observability/logging';
export type { Logger, LogContext, ConsoleLoggerOptions } from './observability/logging';

// Re-export error types
export {
  MetricsError,
  ConfigurationError,
  InvalidNameError,
  LabelCardinalityMismatchError,
  InvalidValueError,
  DuplicateNameError,
  UnknownCollectorError,
  isMetricsError,
  getErrorCategory,
  formatError,
  type ErrorCategory,
} from './errors';

// Re-export label utilities
export { LabelSet, isValidLabelName, isValidMetricName } from './labels';
