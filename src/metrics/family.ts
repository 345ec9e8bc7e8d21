/**
 * Shared child storage for counter, gauge and histogram families.
 *
 * A family owns its children outright: they are created on first use of a
 * label combination and live as long as the family does. Node.js runs each
 * lookup on a single event loop turn, so the get-then-set below is a
 * critical section no other caller can enter; racing first-time callers
 * always converge on one child.
 */

import type { Labels, MetricFamily, MetricType } from '../types';
import { InvalidValueError, LabelCardinalityMismatchError } from '../errors';
import { LabelSet, createLabelKey } from '../labels/label-set';
import { validateLabelNames, validateMetricName } from '../labels/validation';
import { getDefaultRegistry } from '../registry/default';
import type { MetricsRegistry } from '../registry/registry';
import type { CardinalitySource, Collector, CollectorDescription } from './traits';

export interface FamilyOptions {
  name: string;
  help: string;
  labelNames?: readonly string[] | undefined;
}

/**
 * One stored series: its label set and mutable state.
 */
export interface Series<TChild> {
  readonly labels: LabelSet;
  readonly child: TChild;
}

/**
 * Label values as accepted by {@link MetricFamilyBase.labels}.
 */
export type LabelValuesInput = [Labels | readonly string[]] | string[];

export abstract class MetricFamilyBase<TChild> implements Collector, CardinalitySource {
  readonly name: string;
  readonly help: string;
  readonly labelNames: readonly string[];
  abstract readonly type: MetricType;

  private readonly children: Map<string, Series<TChild>> = new Map();
  private readonly createChild: () => TChild;
  private readonly unlabeled: TChild | undefined;

  protected constructor(options: FamilyOptions, createChild: () => TChild) {
    validateMetricName(options.name);
    if (typeof options.help !== 'string') {
      throw new InvalidValueError(`Help text for metric "${options.name}" must be a string`, {
        metricName: options.name,
      });
    }
    const labelNames = options.labelNames ?? [];
    validateLabelNames(labelNames);

    this.name = options.name;
    this.help = options.help;
    this.labelNames = Object.freeze([...labelNames]);
    this.createChild = createChild;

    // Unlabeled families expose their single series from the start.
    this.unlabeled = this.labelNames.length === 0 ? this.labels() : undefined;
  }

  /**
   * Get the child for one label combination, creating it on first use.
   *
   * @example
   * requests.labels('GET', '200').inc();
   * requests.labels(['GET', '200']).inc();
   * requests.labels({ method: 'GET', status: '200' }).inc();
   *
   * @throws LabelCardinalityMismatchError if the values do not match the declared names
   * @throws InvalidValueError if a value is not a string
   */
  labels(values: Labels | readonly string[]): TChild;
  labels(...values: string[]): TChild;
  labels(...args: LabelValuesInput): TChild {
    const values = this.resolveLabelValues(args);
    if (values.length !== this.labelNames.length) {
      throw new LabelCardinalityMismatchError(this.name, this.labelNames, values.length);
    }

    const key = createLabelKey(values);
    const existing = this.children.get(key);
    if (existing) {
      return existing.child;
    }

    const child = this.createChild();
    this.children.set(key, { labels: LabelSet.of(this.labelNames, values), child });
    return child;
  }

  /**
   * Number of distinct label combinations seen so far.
   */
  getCardinality(): number {
    return this.children.size;
  }

  /**
   * Register this family with `registry` (the default registry when omitted).
   * Returns the same handle so construction and registration can be chained.
   *
   * @throws DuplicateNameError if the name is taken by another collector
   */
  register(registry: MetricsRegistry = getDefaultRegistry()): this {
    registry.register(this);
    return this;
  }

  describe(): CollectorDescription[] {
    return [
      {
        name: this.name,
        help: this.help,
        type: this.type,
        labelNames: this.labelNames,
      },
    ];
  }

  abstract collect(): MetricFamily[];

  /**
   * Series in creation order. Collection walks this list.
   */
  protected series(): Series<TChild>[] {
    return [...this.children.values()];
  }

  /**
   * The single child of an unlabeled family.
   *
   * @throws LabelCardinalityMismatchError if the family declares labels
   */
  protected unlabeledChild(): TChild {
    if (this.unlabeled === undefined) {
      throw new LabelCardinalityMismatchError(this.name, this.labelNames, 0);
    }
    return this.unlabeled;
  }

  private resolveLabelValues(args: readonly unknown[]): string[] {
    if (args.length === 1) {
      const [first] = args;
      if (isValueList(first)) {
        return this.requireStrings(first);
      }
      if (typeof first === 'object' && first !== null) {
        return this.valuesFromRecord(first);
      }
    }
    return this.requireStrings(args);
  }

  private valuesFromRecord(record: object): string[] {
    const keys = Object.keys(record);
    const entries = new Map<string, unknown>(Object.entries(record));
    const matches =
      keys.length === this.labelNames.length && this.labelNames.every((name) => entries.has(name));
    if (!matches) {
      throw new LabelCardinalityMismatchError(this.name, this.labelNames, keys);
    }
    return this.requireStrings(this.labelNames.map((name) => entries.get(name)));
  }

  private requireStrings(values: readonly unknown[]): string[] {
    return values.map((value, index) => {
      if (typeof value !== 'string') {
        throw new InvalidValueError(
          `Label value at position ${index} for metric "${this.name}" must be a string, got ${typeof value}`,
          { metricName: this.name }
        );
      }
      return value;
    });
  }
}

function isValueList(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}
