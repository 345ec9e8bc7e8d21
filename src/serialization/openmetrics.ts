import { HistogramValue, MetricFamily, MetricType, RegistrySnapshot } from '../types';
import { escapeLabelValue, formatLabels, formatValue } from './prometheus-text';

/**
 * Content type of the OpenMetrics text format 1.0.0.
 */
export const OPENMETRICS_CONTENT_TYPE =
  'application/openmetrics-text; version=1.0.0; charset=utf-8';

/**
 * Serializes metrics to OpenMetrics format.
 * See: https://github.com/OpenObservability/OpenMetrics/blob/main/specification/OpenMetrics.md
 *
 * Key differences from Prometheus text format:
 * - Counter families are named without the _total suffix; samples carry it
 * - Help text also escapes double quotes
 * - Bucket bounds are rendered as floats (le="1.0")
 * - EOF marker at end
 */
export class OpenMetricsSerializer {
  readonly contentType = OPENMETRICS_CONTENT_TYPE;

  serialize(families: RegistrySnapshot): string {
    let output = '';

    for (const family of families) {
      output += this.serializeFamily(family);
    }

    output += '# EOF\n';
    return output;
  }

  private serializeFamily(family: MetricFamily): string {
    const familyName =
      family.type === MetricType.Counter ? stripTotalSuffix(family.name) : family.name;

    let output = '';
    output += `# HELP ${familyName} ${escapeOpenMetricsText(family.help)}\n`;
    output += `# TYPE ${familyName} ${family.type}\n`;

    if (family.type === MetricType.Histogram) {
      for (const metric of family.metrics) {
        output += this.serializeHistogram(familyName, metric);
      }
      return output;
    }

    const sampleName = family.type === MetricType.Counter ? `${familyName}_total` : familyName;
    for (const metric of family.metrics) {
      output += `${sampleName}${formatLabels(metric.labels)} ${formatValue(metric.value)}\n`;
    }
    return output;
  }

  private serializeHistogram(name: string, histogram: HistogramValue): string {
    let output = '';

    for (const bucket of histogram.buckets) {
      const labels = formatLabels(histogram.labels, { le: formatFloat(bucket.le) });
      output += `${name}_bucket${labels} ${formatValue(bucket.count)}\n`;
    }

    const baseLabels = formatLabels(histogram.labels);
    output += `${name}_sum${baseLabels} ${formatValue(histogram.sum)}\n`;
    output += `${name}_count${baseLabels} ${formatValue(histogram.count)}\n`;

    return output;
  }
}

/**
 * OpenMetrics escapes help text like a label value.
 */
export function escapeOpenMetricsText(text: string): string {
  return escapeLabelValue(text);
}

function stripTotalSuffix(name: string): string {
  return name.endsWith('_total') ? name.slice(0, -'_total'.length) : name;
}

/**
 * Canonical float form: integral values keep a trailing ".0".
 */
function formatFloat(value: number): string {
  const text = formatValue(value);
  return Number.isInteger(value) && !text.includes('e') ? `${text}.0` : text;
}
