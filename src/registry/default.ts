/**
 * Process-wide default registry.
 *
 * Built on first use rather than at import time, so nothing races module
 * initialization order. Tests discard it with `resetDefaultRegistry`.
 */

import { MetricsRegistry } from './registry';

let defaultRegistry: MetricsRegistry | undefined;

export function getDefaultRegistry(): MetricsRegistry {
  if (defaultRegistry === undefined) {
    defaultRegistry = new MetricsRegistry();
  }
  return defaultRegistry;
}

/**
 * Replace the default registry. Returns the previous one, if any was built.
 */
export function setDefaultRegistry(registry: MetricsRegistry): MetricsRegistry | undefined {
  const previous = defaultRegistry;
  defaultRegistry = registry;
  return previous;
}

/**
 * Forget the default registry; the next `getDefaultRegistry` builds a fresh one.
 */
export function resetDefaultRegistry(): void {
  defaultRegistry = undefined;
}
