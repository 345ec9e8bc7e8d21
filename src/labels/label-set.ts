/**
 * Canonical label sets used as child identities inside a metric family.
 */

import type { Labels } from '../types';

/**
 * Immutable, ordered pairing of a family's declared label names with one
 * combination of values. Two label sets over the same names are equal iff
 * their values match positionally, which is exactly when their keys match.
 *
 * @example
 * ```typescript
 * const a = LabelSet.of(['method', 'status'], ['GET', '200']);
 * const b = LabelSet.of(['method', 'status'], ['GET', '200']);
 *
 * a.key === b.key;   // true
 * a.toRecord();      // { method: 'GET', status: '200' }
 * ```
 */
export class LabelSet {
  private static readonly EMPTY = new LabelSet([], []);

  /** Identity key, unique per distinct value sequence */
  readonly key: string;
  private readonly names: readonly string[];
  private readonly values: readonly string[];

  private constructor(names: readonly string[], values: readonly string[]) {
    this.names = names;
    this.values = Object.freeze([...values]);
    this.key = createLabelKey(this.values);
  }

  /**
   * Pairs `names` with `values`. Callers check that both have the same length.
   */
  static of(names: readonly string[], values: readonly string[]): LabelSet {
    if (names.length === 0) {
      return LabelSet.EMPTY;
    }
    return new LabelSet(names, values);
  }

  static empty(): LabelSet {
    return LabelSet.EMPTY;
  }

  get size(): number {
    return this.names.length;
  }

  get(name: string): string | undefined {
    const index = this.names.indexOf(name);
    return index === -1 ? undefined : this.values[index];
  }

  /**
   * Entries in declared order.
   */
  *entries(): IterableIterator<[string, string]> {
    for (let i = 0; i < this.names.length; i++) {
      yield [this.names[i], this.values[i]];
    }
  }

  equals(other: LabelSet): boolean {
    return this.key === other.key;
  }

  /**
   * Plain object in declared label order. A fresh object on every call.
   */
  toRecord(): Labels {
    const record: Labels = {};
    for (const [name, value] of this.entries()) {
      record[name] = value;
    }
    return record;
  }

  toString(): string {
    const pairs: string[] = [];
    for (const [name, value] of this.entries()) {
      pairs.push(`${name}=${JSON.stringify(value)}`);
    }
    return `{${pairs.join(',')}}`;
  }
}

/**
 * Creates the identity key for a sequence of label values.
 * Values are JSON-encoded so no two distinct sequences share a key,
 * whatever separators the values themselves contain.
 *
 * @example
 * ```typescript
 * createLabelKey(['a,b', 'c']) !== createLabelKey(['a', 'b,c']);  // true
 * ```
 */
export function createLabelKey(values: readonly string[]): string {
  return JSON.stringify(values);
}
