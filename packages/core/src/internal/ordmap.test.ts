/**
 * Tests for the sparse ordered map
 */

import { describe, it, expect } from 'vitest';
import {
  compareOrdKeys,
  ordEmpty,
  ordIsEmpty,
  ordGet,
  ordSet,
  ordDelete,
  ordIter,
  ordMapMaybeWithKey,
  ordMergeWithKey,
} from './ordmap';
import type { OrdKey, OrdMap } from './types';

function fromPairs<V>(pairs: [OrdKey, V][]): OrdMap<V> {
  let map = ordEmpty<V>();
  for (const [key, value] of pairs) map = ordSet(map, key, value);
  return map;
}

const keep = <V>(map: OrdMap<V>): OrdMap<V> => map;

describe('ordmap', () => {
  it('should compare numbers and bigints by value', () => {
    expect(compareOrdKeys(1, 2)).toBe(-1);
    expect(compareOrdKeys(3n, 2n)).toBe(1);
    expect(compareOrdKeys(5n, 5n)).toBe(0);
  });

  it('should replace an existing key instead of duplicating it', () => {
    const map = fromPairs([[5, 'a'], [5, 'b']]);
    expect(map.tree.length).toBe(1);
    expect(ordGet(map, 5)).toBe('b');
  });

  it('should return the same map when nothing changes', () => {
    const map = fromPairs([[1, 'a']]);
    expect(ordSet(map, 1, 'a')).toBe(map);
    expect(ordDelete(map, 2)).toBe(map);
  });

  it('should delete without touching the previous version', () => {
    const map = fromPairs([[1, 'a'], [2, 'b']]);
    const next = ordDelete(map, 1);

    expect([...ordIter(next)]).toEqual([[2, 'b']]);
    expect(ordGet(map, 1)).toBe('a');
    expect(ordIsEmpty(ordDelete(next, 2))).toBe(true);
  });

  it('should iterate in ascending order', () => {
    const map = fromPairs([[10, 'd'], [-1.5, 'a'], [2, 'c'], [0, 'b']]);
    expect([...ordIter(map)]).toEqual([[-1.5, 'a'], [0, 'b'], [2, 'c'], [10, 'd']]);
  });

  it('should map and drop entries', () => {
    const map = fromPairs([[1, 1], [2, 2], [3, 3]]);
    const result = ordMapMaybeWithKey((key, value: number) => (key === 2 ? undefined : value * 10), map);
    expect([...ordIter(result)]).toEqual([[1, 10], [3, 30]]);
  });

  describe('ordMergeWithKey', () => {
    it('should join both sides in key order', () => {
      const left = fromPairs([[1, 'a'], [3, 'c']]);
      const right = fromPairs([[2, 'B'], [3, 'C']]);
      const result = ordMergeWithKey((_, a: string, b: string) => a + b, keep, keep, left, right);

      expect([...ordIter(result)]).toEqual([[1, 'a'], [2, 'B'], [3, 'cC']]);
    });

    it('should call each one-sided transform once with all of its keys', () => {
      const left = fromPairs([[1, 'a'], [3, 'c'], [7, 'g']]);
      const right = fromPairs([[3, 'C'], [5, 'E']]);
      const calls: OrdKey[][] = [];
      const collect = (map: OrdMap<string>): OrdMap<string> => {
        calls.push([...ordIter(map)].map(([key]) => key));
        return map;
      };

      ordMergeWithKey((_, a: string) => a, collect, collect, left, right);

      expect(calls).toEqual([[1, 7], [5]]);
    });

    it('should pass a whole side over when the other is empty', () => {
      const map = fromPairs([[1, 'a']]);
      expect(ordMergeWithKey(() => undefined, keep, keep, ordEmpty<string>(), map)).toBe(map);
      expect(ordMergeWithKey(() => undefined, keep, keep, map, ordEmpty<string>())).toBe(map);
    });
  });
});
