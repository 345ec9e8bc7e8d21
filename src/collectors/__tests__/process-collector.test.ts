/**
 * Tests for ProcessCollector.
 */

import { describe, it, expect } from 'vitest';
import { ProcessCollector, type ProcessReadings } from '../process-collector';
import { MetricsRegistry } from '../../registry/registry';
import { DuplicateNameError, InvalidNameError } from '../../errors';
import { createNoopLogger } from '../../observability/logging';
import { MetricType } from '../../types';

function fakeReadings(overrides: Partial<ProcessReadings> = {}): ProcessReadings {
  return {
    cpuUsage: () => ({ user: 1_500_000, system: 250_000 }),
    memoryUsage: () => ({
      rss: 4096,
      heapTotal: 2048,
      heapUsed: 1024,
      external: 0,
      arrayBuffers: 0,
    }),
    startTime: () => 1700000000,
    openFds: () => 12,
    maxFds: () => 1024,
    ...overrides,
  };
}

describe('ProcessCollector', () => {
  it('should describe every process metric', () => {
    const collector = new ProcessCollector({}, fakeReadings());

    expect(collector.describe().map((d) => d.name)).toEqual([
      'process_cpu_user_seconds_total',
      'process_cpu_system_seconds_total',
      'process_cpu_seconds_total',
      'process_resident_memory_bytes',
      'process_heap_bytes',
      'process_start_time_seconds',
      'process_open_fds',
      'process_max_fds',
    ]);
  });

  it('should convert readings at collection time', () => {
    const collector = new ProcessCollector({}, fakeReadings());

    const values = Object.fromEntries(
      collector.collect().map((family) => [family.name, family.metrics[0]])
    );

    expect(values).toEqual({
      process_cpu_user_seconds_total: { labels: {}, value: 1.5 },
      process_cpu_system_seconds_total: { labels: {}, value: 0.25 },
      process_cpu_seconds_total: { labels: {}, value: 1.75 },
      process_resident_memory_bytes: { labels: {}, value: 4096 },
      process_heap_bytes: { labels: {}, value: 1024 },
      process_start_time_seconds: { labels: {}, value: 1700000000 },
      process_open_fds: { labels: {}, value: 12 },
      process_max_fds: { labels: {}, value: 1024 },
    });
  });

  it('should type CPU time as counters and the rest as gauges', () => {
    const types = new ProcessCollector({ collectFds: false }, fakeReadings())
      .describe()
      .map((d) => d.type);

    expect(types).toEqual([
      MetricType.Counter,
      MetricType.Counter,
      MetricType.Counter,
      MetricType.Gauge,
      MetricType.Gauge,
      MetricType.Gauge,
    ]);
  });

  it('should emit no sample for a reading the platform lacks', () => {
    const collector = new ProcessCollector(
      {},
      fakeReadings({ openFds: () => undefined, maxFds: () => undefined })
    );

    const fds = collector.collect().filter((family) => family.name.endsWith('_fds'));

    expect(fds.map((family) => family.metrics)).toEqual([[], []]);
  });

  it('should apply a custom prefix', () => {
    const collector = new ProcessCollector({ prefix: 'worker', collectFds: false }, fakeReadings());

    expect(collector.describe()[0].name).toBe('worker_cpu_user_seconds_total');
  });

  it('should reject a prefix that yields invalid names', () => {
    expect(() => new ProcessCollector({ prefix: 'bad-prefix' }, fakeReadings())).toThrow(
      InvalidNameError
    );
  });

  it('should render through a registry', () => {
    const registry = new MetricsRegistry({ logger: createNoopLogger() });
    registry.register(new ProcessCollector({ collectFds: false }, fakeReadings()));

    const lines = registry.metrics().split('\n');

    expect(lines.slice(0, 3)).toEqual([
      '# HELP process_cpu_user_seconds_total Total user CPU time spent in seconds.',
      '# TYPE process_cpu_user_seconds_total counter',
      'process_cpu_user_seconds_total 1.5',
    ]);
    expect(() =>
      registry.register(new ProcessCollector({ collectFds: false }, fakeReadings()))
    ).toThrow(DuplicateNameError);
  });
});
