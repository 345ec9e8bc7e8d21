/**
 * Tests for LabelSet.
 */

import { describe, it, expect } from 'vitest';
import { LabelSet, createLabelKey } from '../label-set';

describe('LabelSet', () => {
  it('should pair names with values in declared order', () => {
    const set = LabelSet.of(['status', 'method'], ['200', 'GET']);

    expect([...set.entries()]).toEqual([
      ['status', '200'],
      ['method', 'GET'],
    ]);
    expect(set.size).toBe(2);
    expect(set.get('method')).toBe('GET');
    expect(set.get('path')).toBeUndefined();
  });

  it('should be equal exactly when values match positionally', () => {
    const a = LabelSet.of(['method', 'status'], ['GET', '200']);
    const b = LabelSet.of(['method', 'status'], ['GET', '200']);
    const c = LabelSet.of(['method', 'status'], ['200', 'GET']);

    expect(a.equals(b)).toBe(true);
    expect(a.key).toBe(b.key);
    expect(a.equals(c)).toBe(false);
  });

  it('should share one empty set', () => {
    expect(LabelSet.of([], [])).toBe(LabelSet.empty());
    expect(LabelSet.empty().toRecord()).toEqual({});
    expect(LabelSet.empty().toString()).toBe('{}');
  });

  it('should not be affected by later changes to the input values', () => {
    const values = ['GET'];
    const set = LabelSet.of(['method'], values);

    values[0] = 'POST';

    expect(set.get('method')).toBe('GET');
  });

  it('should return a fresh record each time', () => {
    const set = LabelSet.of(['method'], ['GET']);
    const record = set.toRecord();

    record.method = 'POST';

    expect(set.toRecord()).toEqual({ method: 'GET' });
  });

  it('should quote values in its string form', () => {
    expect(LabelSet.of(['path', 'q'], ['/a', 'x"y']).toString()).toBe('{path="/a",q="x\\"y"}');
  });
});

describe('createLabelKey', () => {
  it('should keep sequences with embedded separators apart', () => {
    expect(createLabelKey(['a,b', 'c'])).not.toBe(createLabelKey(['a', 'b,c']));
    expect(createLabelKey(['a', ''])).not.toBe(createLabelKey(['a']));
  });
});
