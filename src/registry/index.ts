/**
 * Registry module.
 * Provides the central registry, the process-wide default instance,
 * get-or-create helpers and cardinality monitoring.
 */

export { MetricsRegistry } from './registry';
export { getDefaultRegistry, setDefaultRegistry, resetDefaultRegistry } from './default';
export { getOrCreateCounter, getOrCreateGauge, getOrCreateHistogram } from './factories';
export { CardinalityMonitor } from './cardinality';
export type { CardinalityStats } from './cardinality';
