import {
  HistogramValue,
  Labels,
  MetricFamily,
  MetricType,
  MetricValue,
  RegistrySnapshot,
} from '../types';

/**
 * Content type of the Prometheus text exposition format v0.0.4.
 */
export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

/**
 * Serializes metrics to Prometheus text exposition format v0.0.4.
 * See: https://prometheus.io/docs/instrumenting/exposition_formats/
 *
 * Every family block ends with a newline and no blank lines are emitted, so
 * the output of several calls can be concatenated into one document.
 */
export class PrometheusTextSerializer {
  readonly contentType = PROMETHEUS_CONTENT_TYPE;

  /**
   * Serialize metric families to Prometheus text format.
   */
  serialize(families: RegistrySnapshot): string {
    let output = '';
    for (const family of families) {
      output += this.serializeFamily(family);
    }
    return output;
  }

  private serializeFamily(family: MetricFamily): string {
    let output = '';

    output += `# HELP ${family.name} ${escapeHelpText(family.help)}\n`;
    output += `# TYPE ${family.name} ${family.type}\n`;

    if (family.type === MetricType.Histogram) {
      for (const metric of family.metrics) {
        output += this.serializeHistogram(family.name, metric);
      }
    } else {
      for (const metric of family.metrics) {
        output += this.serializeMetric(family.name, metric);
      }
    }

    return output;
  }

  private serializeMetric(name: string, metric: MetricValue): string {
    return `${name}${formatLabels(metric.labels)} ${formatValue(metric.value)}\n`;
  }

  private serializeHistogram(name: string, histogram: HistogramValue): string {
    let output = '';

    for (const bucket of histogram.buckets) {
      const labels = formatLabels(histogram.labels, { le: formatValue(bucket.le) });
      output += `${name}_bucket${labels} ${formatValue(bucket.count)}\n`;
    }

    const baseLabels = formatLabels(histogram.labels);
    output += `${name}_sum${baseLabels} ${formatValue(histogram.sum)}\n`;
    output += `${name}_count${baseLabels} ${formatValue(histogram.count)}\n`;

    return output;
  }
}

/**
 * Escape help text according to Prometheus format.
 * Backslashes and newlines must be escaped; quotes are left as they are.
 */
export function escapeHelpText(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

/**
 * Escape label value according to Prometheus format.
 * Backslashes, quotes, and newlines must be escaped.
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Format labels as Prometheus label string, keeping their insertion order.
 * `extra` labels (such as `le`) are appended after the sample's own.
 * Returns empty string if there are no labels at all.
 *
 * @example
 * formatLabels({ method: 'GET' }, { le: '0.5' })  // '{method="GET",le="0.5"}'
 */
export function formatLabels(labels: Readonly<Labels>, extra: Readonly<Labels> = {}): string {
  const pairs = [...Object.entries(labels), ...Object.entries(extra)].map(
    ([key, value]) => `${key}="${escapeLabelValue(value)}"`
  );
  if (pairs.length === 0) {
    return '';
  }
  return `{${pairs.join(',')}}`;
}

/**
 * Format a numeric value according to Prometheus format.
 * Handles NaN, +Inf, -Inf, and regular numbers.
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }

  if (!Number.isFinite(value)) {
    return value > 0 ? '+Inf' : '-Inf';
  }

  // Shortest round-trip form; integers render without a decimal point
  return String(value);
}
