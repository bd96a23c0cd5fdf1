import { describe, it, expect } from 'vitest';
import { diffFactSets } from '../diff.js';
import type { Fact } from '../types.js';

describe('diffFactSets', () => {
  it('reports added, removed and modified keys sorted by key', () => {
    const before: Fact[] = [
      { key: 'c', value: true },
      { key: 'a', value: 1 },
      { key: 'b', value: 'x' },
    ];
    const after: Fact[] = [
      { key: 'd', value: null },
      { key: 'b', value: 'y' },
      { key: 'c', value: true },
    ];

    expect(diffFactSets(before, after)).toEqual([
      { key: 'a', changeType: 'removed', oldValue: 1, newValue: undefined },
      { key: 'b', changeType: 'modified', oldValue: 'x', newValue: 'y' },
      { key: 'd', changeType: 'added', oldValue: undefined, newValue: null },
    ]);
  });

  it('returns nothing for identical sets', () => {
    const facts: Fact[] = [{ key: 'a', value: 1 }];
    expect(diffFactSets(facts, [...facts])).toEqual([]);
  });

  it('ignores evidence span changes', () => {
    expect(diffFactSets(
      [{ key: 'a', value: 'same', evidenceSpan: [0, 4] }],
      [{ key: 'a', value: 'same', evidenceSpan: [10, 14] }]
    )).toEqual([]);
  });

  it('treats a value changing type as a modification', () => {
    expect(diffFactSets([{ key: 'n', value: 1 }], [{ key: 'n', value: '1' }])).toEqual([
      { key: 'n', changeType: 'modified', oldValue: 1, newValue: '1' },
    ]);
  });

  it('treats null and a missing key differently', () => {
    expect(diffFactSets([{ key: 'a', value: null }], [])).toEqual([
      { key: 'a', changeType: 'removed', oldValue: null, newValue: undefined },
    ]);
  });
});
