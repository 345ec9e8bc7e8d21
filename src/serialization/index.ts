/**
 * Serialization module for Prometheus and OpenMetrics formats.
 */

import { OPENMETRICS_CONTENT_TYPE, OpenMetricsSerializer } from './openmetrics';
import { PROMETHEUS_CONTENT_TYPE, PrometheusTextSerializer } from './prometheus-text';
import type { RegistrySnapshot } from '../types';

export { PrometheusTextSerializer, PROMETHEUS_CONTENT_TYPE } from './prometheus-text';
export { OpenMetricsSerializer, OPENMETRICS_CONTENT_TYPE } from './openmetrics';
export {
  escapeHelpText,
  escapeLabelValue,
  formatLabels,
  formatValue,
} from './prometheus-text';
export { escapeOpenMetricsText } from './openmetrics';

export type OutputFormat = 'prometheus' | 'openmetrics';

/**
 * Anything that turns a registry snapshot into an exposition body.
 */
export interface Serializer {
  readonly contentType: string;
  serialize(families: RegistrySnapshot): string;
}

/**
 * Factory function to create a serializer for the specified format.
 */
export function createSerializer(format: OutputFormat = 'prometheus'): Serializer {
  switch (format) {
    case 'prometheus':
      return new PrometheusTextSerializer();
    case 'openmetrics':
      return new OpenMetricsSerializer();
  }
}

/**
 * Content type an HTTP layer should send for `format`.
 */
export function contentTypeFor(format: OutputFormat): string {
  return format === 'openmetrics' ? OPENMETRICS_CONTENT_TYPE : PROMETHEUS_CONTENT_TYPE;
}
