/**
 * Process metrics collector - Tracks process-level metrics like CPU, memory, and file descriptors.
 *
 * Exposes standard process metrics following Prometheus naming conventions:
 * - process_cpu_user_seconds_total
 * - process_cpu_system_seconds_total
 * - process_cpu_seconds_total
 * - process_resident_memory_bytes
 * - process_heap_bytes
 * - process_start_time_seconds
 * - process_open_fds (Linux only)
 * - process_max_fds (Linux only)
 *
 * Values are read when the registry collects; nothing runs in the background.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { MetricType, type MetricFamily, type ScalarMetricFamily } from '../types';
import { validateMetricName } from '../labels/validation';
import type { Collector, CollectorDescription } from '../metrics/traits';

/**
 * Process collector configuration.
 */
export interface ProcessCollectorConfig {
  /** Prefix for metric names (default: 'process') */
  prefix?: string;
  /** Collect file descriptor metrics where /proc is available (default: true) */
  collectFds?: boolean;
}

/**
 * Source of process readings. Replaced in tests.
 */
export interface ProcessReadings {
  cpuUsage(): NodeJS.CpuUsage;
  memoryUsage(): NodeJS.MemoryUsage;
  /** Process start time, seconds since epoch */
  startTime(): number;
  openFds(): number | undefined;
  maxFds(): number | undefined;
}

interface ProcessMetricSpec {
  suffix: string;
  help: string;
  type: MetricType.Counter | MetricType.Gauge;
  read: (readings: ProcessReadings) => number | undefined;
}

const PROCESS_METRICS: readonly ProcessMetricSpec[] = [
  {
    suffix: 'cpu_user_seconds_total',
    help: 'Total user CPU time spent in seconds.',
    type: MetricType.Counter,
    read: (r) => r.cpuUsage().user / 1e6,
  },
  {
    suffix: 'cpu_system_seconds_total',
    help: 'Total system CPU time spent in seconds.',
    type: MetricType.Counter,
    read: (r) => r.cpuUsage().system / 1e6,
  },
  {
    suffix: 'cpu_seconds_total',
    help: 'Total user and system CPU time spent in seconds.',
    type: MetricType.Counter,
    read: (r) => {
      const usage = r.cpuUsage();
      return (usage.user + usage.system) / 1e6;
    },
  },
  {
    suffix: 'resident_memory_bytes',
    help: 'Resident memory size in bytes.',
    type: MetricType.Gauge,
    read: (r) => r.memoryUsage().rss,
  },
  {
    suffix: 'heap_bytes',
    help: 'Process heap size in bytes.',
    type: MetricType.Gauge,
    read: (r) => r.memoryUsage().heapUsed,
  },
  {
    suffix: 'start_time_seconds',
    help: 'Start time of the process since unix epoch in seconds.',
    type: MetricType.Gauge,
    read: (r) => r.startTime(),
  },
];

const FD_METRICS: readonly ProcessMetricSpec[] = [
  {
    suffix: 'open_fds',
    help: 'Number of open file descriptors.',
    type: MetricType.Gauge,
    read: (r) => r.openFds(),
  },
  {
    suffix: 'max_fds',
    help: 'Maximum number of open file descriptors.',
    type: MetricType.Gauge,
    read: (r) => r.maxFds(),
  },
];

/**
 * Readings from the running Node.js process.
 */
export const nodeProcessReadings: ProcessReadings = {
  cpuUsage: () => process.cpuUsage(),
  memoryUsage: () => process.memoryUsage(),
  startTime: () => Date.now() / 1000 - process.uptime(),
  openFds: () => readProc(() => readdirSync('/proc/self/fd').length),
  maxFds: () =>
    readProc(() => {
      const limits = readFileSync('/proc/self/limits', 'utf-8');
      const match = limits.match(/Max open files\s+(\d+)/);
      return match ? parseInt(match[1], 10) : undefined;
    }),
};

/**
 * Collector for process-level metrics.
 *
 * @example
 * registry.register(new ProcessCollector());
 */
export class ProcessCollector implements Collector {
  private readonly specs: readonly ProcessMetricSpec[];
  private readonly prefix: string;

  constructor(
    config: ProcessCollectorConfig = {},
    private readonly readings: ProcessReadings = nodeProcessReadings
  ) {
    this.prefix = config.prefix ?? 'process';
    this.specs = (config.collectFds ?? true) ? [...PROCESS_METRICS, ...FD_METRICS] : PROCESS_METRICS;
    for (const spec of this.specs) {
      validateMetricName(this.metricName(spec));
    }
  }

  describe(): CollectorDescription[] {
    return this.specs.map((spec) => ({
      name: this.metricName(spec),
      help: spec.help,
      type: spec.type,
      labelNames: [],
    }));
  }

  /**
   * Read every metric now. Metrics without a reading on this platform
   * are emitted with their HELP/TYPE header only.
   */
  collect(): MetricFamily[] {
    return this.specs.map((spec): ScalarMetricFamily => {
      const value = spec.read(this.readings);
      return {
        name: this.metricName(spec),
        help: spec.help,
        type: spec.type,
        labelNames: [],
        metrics: value === undefined ? [] : [{ labels: {}, value }],
      };
    });
  }

  private metricName(spec: ProcessMetricSpec): string {
    return `${this.prefix}_${spec.suffix}`;
  }
}

/**
 * Run a /proc read; platforms without /proc yield undefined.
 */
function readProc(read: () => number | undefined): number | undefined {
  if (process.platform !== 'linux') {
    return undefined;
  }
  try {
    return read();
  } catch {
    return undefined;
  }
}
