/**
 * Cardinality monitoring for registered families.
 *
 * Families never evict series; callers bound their own label values. The
 * monitor only reports families whose series count has grown past a
 * configured limit, once per family until it drops back below.
 */

import type { Logger } from '../observability/logging';

export interface CardinalityStats {
  current: number;
  limit: number;
  utilization: number;
}

export class CardinalityMonitor {
  private readonly limits: Map<string, number>;
  private readonly counts: Map<string, number> = new Map();
  private readonly reported: Set<string> = new Set();

  constructor(
    private readonly logger: Logger,
    private readonly defaultLimit: number,
    limits: Readonly<Record<string, number>> = {}
  ) {
    this.limits = new Map(Object.entries(limits));
  }

  /**
   * Record the current series count of a family.
   * Returns true if the count exceeds the family's limit.
   */
  observe(metricName: string, cardinality: number): boolean {
    this.counts.set(metricName, cardinality);

    const limit = this.getLimit(metricName);
    if (cardinality <= limit) {
      this.reported.delete(metricName);
      return false;
    }

    if (!this.reported.has(metricName)) {
      this.reported.add(metricName);
      this.logger.warn('Metric cardinality above warning limit', {
        metric: metricName,
        cardinality,
        limit,
      });
    }
    return true;
  }

  getLimit(metricName: string): number {
    return this.limits.get(metricName) ?? this.defaultLimit;
  }

  getCardinality(metricName: string): number {
    return this.counts.get(metricName) ?? 0;
  }

  /**
   * Get all cardinality stats from the last collection.
   */
  getStats(): Map<string, CardinalityStats> {
    const stats = new Map<string, CardinalityStats>();

    for (const [metricName, current] of this.counts.entries()) {
      const limit = this.getLimit(metricName);
      stats.set(metricName, { current, limit, utilization: current / limit });
    }

    return stats;
  }

  /**
   * Forget a family, or every family when no name is given.
   */
  reset(metricName?: string): void {
    if (metricName) {
      this.counts.delete(metricName);
      this.reported.delete(metricName);
    } else {
      this.counts.clear();
      this.reported.clear();
    }
  }
}
