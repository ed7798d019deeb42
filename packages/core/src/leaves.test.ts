/**
 * Tests for leaf key types
 */

import { describe, it, expect } from 'vitest';
import { Trie } from './trie';
import {
  byte,
  char,
  float64,
  int16,
  int32,
  int64,
  int8,
  integer,
  uint16,
  uint32,
  uint64,
  uint8,
} from './leaves';
import { KeyDomainError, ShapeMismatchError } from './errors';
import type { TrieKey } from './internal/types';

function keysOf<K>(key: TrieKey<K>, keys: K[]): K[] {
  return [...Trie.fromEntries(key, keys.map((k, i) => [k, i] as const)).keys()];
}

describe('dense leaves', () => {
  it('should order signed keys numerically', () => {
    expect(keysOf(int8, [5, -128, 127, 0, -1])).toEqual([-128, -1, 0, 5, 127]);
    expect(keysOf(int16, [300, -300, 0])).toEqual([-300, 0, 300]);
  });

  it('should cover the whole int32 range', () => {
    expect(keysOf(int32, [2147483647, -2147483648, 0])).toEqual([-2147483648, 0, 2147483647]);
  });

  it('should order unsigned keys numerically', () => {
    expect(keysOf(uint16, [65535, 0, 256])).toEqual([0, 256, 65535]);
    expect(keysOf(uint8, [255, 31, 32])).toEqual([31, 32, 255]);
  });

  it('should treat byte as uint8', () => {
    expect(byte).toBe(uint8);
  });

  it('should reject keys outside the domain', () => {
    const trie = Trie.empty<number, string>(int8);
    expect(() => trie.set(128, 'x')).toThrow(KeyDomainError);
    expect(() => trie.set(-129, 'x')).toThrow(KeyDomainError);
    expect(() => trie.get(1.5)).toThrow(KeyDomainError);
    expect(() => Trie.empty<number, string>(uint8).set(-1, 'x')).toThrow(KeyDomainError);
  });

  it('should name the key type in domain errors', () => {
    expect(() => Trie.empty<number, string>(uint16).get(70000)).toThrow('70000 is not a valid uint16 key');
  });

  describe('char', () => {
    it('should order by code point', () => {
      expect(keysOf(char, ['😀', 'b', 'é', 'a'])).toEqual(['a', 'b', 'é', '😀']);
    });

    it('should reject anything but a single code point', () => {
      const trie = Trie.empty<string, number>(char);
      expect(() => trie.set('', 1)).toThrow(KeyDomainError);
      expect(() => trie.set('ab', 1)).toThrow(KeyDomainError);
      expect(trie.set('😀', 1).get('😀')).toBe(1);
    });
  });
});

describe('sparse leaves', () => {
  it('should order uint32 keys', () => {
    expect(keysOf(uint32, [4294967295, 0, 70000])).toEqual([0, 70000, 4294967295]);
    expect(() => Trie.empty<number, string>(uint32).set(-1, 'x')).toThrow(KeyDomainError);
  });

  it('should order float64 keys including infinities', () => {
    expect(keysOf(float64, [Infinity, 2.5, -0.5, -Infinity])).toEqual([-Infinity, -0.5, 2.5, Infinity]);
  });

  it('should treat -0 and 0 as one float64 key', () => {
    const trie = Trie.empty<number, string>(float64).set(-0, 'a');
    expect(trie.get(0)).toBe('a');
    expect(trie.set(0, 'b').toArray()).toEqual([[0, 'b']]);
  });

  it('should reject NaN', () => {
    expect(() => Trie.empty<number, string>(float64).set(NaN, 'x')).toThrow(KeyDomainError);
  });

  it('should bound int64 and uint64', () => {
    const max = 2n ** 63n - 1n;
    const min = -(2n ** 63n);
    expect(keysOf(int64, [max, -1n, min])).toEqual([min, -1n, max]);
    expect(() => Trie.empty<bigint, string>(int64).set(2n ** 63n, 'x')).toThrow(KeyDomainError);
    expect(() => Trie.empty<bigint, string>(uint64).set(-1n, 'x')).toThrow(KeyDomainError);
    expect(Trie.empty<bigint, string>(uint64).set(2n ** 64n - 1n, 'x').size).toBe(1);
  });

  it('should accept integers of any size', () => {
    const big = 10n ** 30n;
    expect(keysOf(integer, [big, -big, 0n])).toEqual([-big, 0n, big]);
  });
});

describe('mixed tries', () => {
  it('should reject a dense node under a sparse key type', () => {
    const trie = Trie.of(uint32, int8.empty<string>());
    expect(() => trie.get(1)).toThrow(ShapeMismatchError);
  });

  it('should reject merging dense maps of different widths', () => {
    const wide = Trie.of(uint8, int16.empty<string>()).set(1, 'a');
    const narrow = Trie.empty<number, string>(uint8).set(1, 'b');
    expect(() => narrow.union(wide)).toThrow(ShapeMismatchError);
  });
});
