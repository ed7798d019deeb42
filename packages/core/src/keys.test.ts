/**
 * Tests for shape-derived key types
 */

import { describe, it, expect } from 'vitest';
import { Trie } from './trie';
import { defineKey } from './key';
import { uint8, int8 } from './leaves';
import {
  boolean,
  either,
  enumeration,
  list,
  maybe,
  ordering,
  pair,
  quadruple,
  quintuple,
  septuple,
  sextuple,
  string,
  triple,
  unitKey,
  voidKey,
} from './keys';
import { UNIT, field, left, product, right, sum, unit, type Either, type Unit } from './shape';
import { KeyDomainError } from './errors';
import type { TrieKey } from './internal/types';

function keysOf<K>(key: TrieKey<K>, keys: K[]): K[] {
  return [...Trie.fromEntries(key, keys.map((k, i) => [k, i] as const)).keys()];
}

describe('keys', () => {
  it('should hold at most one entry under the unit key', () => {
    const trie = Trie.empty<Unit, string>(unitKey).set(UNIT, 'a').set(UNIT, 'b');
    expect(trie.toArray()).toEqual([[UNIT, 'b']]);
  });

  it('should keep void tries empty', () => {
    const trie = Trie.empty<never, string>(voidKey);
    expect(trie.isEmpty).toBe(true);
    expect(trie.size).toBe(0);
    expect(trie.union(trie).isEmpty).toBe(true);
  });

  it('should order booleans false first', () => {
    expect(keysOf(boolean, [true, false])).toEqual([false, true]);
  });

  it('should order comparator results', () => {
    expect(keysOf(ordering, [1, -1, 0])).toEqual([-1, 0, 1]);
  });

  describe('enumeration', () => {
    const color = enumeration('color', ['red', 'green', 'blue'] as const);

    it('should order values as listed', () => {
      expect(keysOf(color, ['blue', 'red', 'green'])).toEqual(['red', 'green', 'blue']);
    });

    it('should reject values outside the list', () => {
      const loose = enumeration<string>('color', ['red', 'green']);
      expect(() => Trie.empty<string, number>(loose).set('purple', 1)).toThrow(KeyDomainError);
      expect(() => loose.focus('purple', loose.empty<number>())).toThrow('purple is not a valid color key');
    });

    it('should support a single value', () => {
      const only = enumeration('only', ['x']);
      expect(Trie.empty<string, number>(only).set('x', 1).toArray()).toEqual([['x', 1]]);
    });

    it('should start empty with no values', () => {
      const none = enumeration<string>('none', []);
      expect(Trie.empty<string, number>(none).isEmpty).toBe(true);
    });
  });

  it('should order a missing value first', () => {
    expect(keysOf(maybe(uint8), [3, undefined, 0])).toEqual([undefined, 0, 3]);
  });

  it('should order every left value before every right value', () => {
    const key = either(int8, int8);
    const keys: Either<number, number>[] = [right(-100), left(100), right(0), left(-5)];
    expect(keysOf(key, keys)).toEqual([left(-5), left(100), right(-100), right(0)]);
  });

  describe('tuples', () => {
    it('should order pairs lexicographically', () => {
      expect(keysOf(pair(uint8, int8), [[1, -1], [0, 5], [1, -2]])).toEqual([[0, 5], [1, -2], [1, -1]]);
    });

    it('should flatten triples back out', () => {
      const key = triple(uint8, uint8, uint8);
      expect(keysOf(key, [[1, 2, 3], [1, 1, 9], [0, 5, 5]])).toEqual([[0, 5, 5], [1, 1, 9], [1, 2, 3]]);
    });

    it('should flatten quadruples back out', () => {
      const key = quadruple(uint8, boolean, uint8, boolean);
      expect(keysOf(key, [[1, true, 0, false], [1, false, 7, true]])).toEqual([
        [1, false, 7, true],
        [1, true, 0, false],
      ]);
    });

    it('should order quintuples by their last component once the rest tie', () => {
      const key = quintuple(uint8, uint8, uint8, uint8, int8);
      expect(
        keysOf(key, [
          [0, 0, 0, 1, -5],
          [0, 0, 0, 0, 7],
          [0, 0, 0, 0, -7],
        ])
      ).toEqual([
        [0, 0, 0, 0, -7],
        [0, 0, 0, 0, 7],
        [0, 0, 0, 1, -5],
      ]);
    });

    it('should order sextuples lexicographically', () => {
      const key = sextuple(boolean, uint8, boolean, uint8, boolean, uint8);
      expect(
        keysOf(key, [
          [true, 0, false, 0, false, 0],
          [false, 9, true, 9, true, 9],
          [false, 9, true, 9, false, 200],
        ])
      ).toEqual([
        [false, 9, true, 9, false, 200],
        [false, 9, true, 9, true, 9],
        [true, 0, false, 0, false, 0],
      ]);
    });

    it('should order septuples lexicographically and read them back', () => {
      const key = septuple(uint8, uint8, uint8, uint8, uint8, uint8, string);
      const trie = Trie.fromEntries<readonly [number, number, number, number, number, number, string], string>(key, [
        [[1, 2, 3, 4, 5, 6, 'b'], 'second'],
        [[1, 2, 3, 4, 5, 6, 'a'], 'first'],
        [[1, 2, 3, 4, 5, 7, ''], 'third'],
        [[0, 9, 9, 9, 9, 9, 'z'], 'zeroth'],
      ]);

      expect([...trie.values()]).toEqual(['zeroth', 'first', 'second', 'third']);
      expect(trie.get([1, 2, 3, 4, 5, 6, 'a'])).toBe('first');
      expect([...trie.keys()][0]).toEqual([0, 9, 9, 9, 9, 9, 'z']);
    });
  });

  describe('list', () => {
    const bytes = list(uint8);

    it('should order prefixes before their extensions', () => {
      expect(keysOf(bytes, [[1], [], [0, 5], [1, 0], [0]])).toEqual([[], [0], [0, 5], [1], [1, 0]]);
    });

    it('should keep lists that share a prefix apart', () => {
      const trie = Trie.fromEntries<readonly number[], string>(bytes, [
        [[1, 2, 3], 'long'],
        [[1, 2], 'short'],
      ]);
      expect(trie.get([1, 2])).toBe('short');
      expect(trie.get([1, 2, 3])).toBe('long');
      expect(trie.get([1])).toBeUndefined();
      expect(trie.remove([1, 2]).toArray()).toEqual([[[1, 2, 3], 'long']]);
    });

    it('should nest', () => {
      const nested = list(list(uint8));
      expect(keysOf(nested, [[[2]], [[1], [3]], [[1]]])).toEqual([[[1]], [[1], [3]], [[2]]]);
    });
  });

  describe('string', () => {
    it('should order like a dictionary', () => {
      expect(keysOf(string, ['b', 'ab', '', 'a', 'abc'])).toEqual(['', 'a', 'ab', 'abc', 'b']);
    });

    it('should compare by code point', () => {
      expect(keysOf(string, ['😀', 'z', 'Z'])).toEqual(['Z', 'z', '😀']);
    });

    it('should empty out after removing every key', () => {
      const trie = Trie.fromEntries<string, number>(string, [['cat', 1], ['car', 2], ['ca', 3]]);
      const emptied = trie.remove('cat').remove('car').remove('ca');
      expect(emptied.isEmpty).toBe(true);
      expect(emptied.equals(Trie.empty<string, number>(string))).toBe(true);
    });
  });

  it('should derive a key type from a user shape', () => {
    type Shade = { kind: 'grey' } | { kind: 'rgb'; r: number; g: number };
    const shade = defineKey<Shade, Either<Unit, readonly [number, number]>>(
      'shade',
      sum(unit, product(field(uint8), field(uint8))),
      (s) => (s.kind === 'grey' ? left(UNIT) : right<readonly [number, number]>([s.r, s.g])),
      (rep) => (rep.tag === 'left' ? { kind: 'grey' } : { kind: 'rgb', r: rep.value[0], g: rep.value[1] })
    );

    const trie = Trie.fromEntries<Shade, string>(shade, [
      [{ kind: 'rgb', r: 9, g: 0 }, 'teal'],
      [{ kind: 'grey' }, 'grey'],
      [{ kind: 'rgb', r: 1, g: 200 }, 'green'],
    ]);

    expect([...trie.values()]).toEqual(['grey', 'green', 'teal']);
    expect(trie.get({ kind: 'rgb', r: 9, g: 0 })).toBe('teal');
  });
});
