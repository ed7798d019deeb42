/**
 * Leaf key types
 *
 * Bounded domains (small integers, characters) sit on the dense bitmap trie
 * and cost O(1) per access. Unbounded domains (64-bit and arbitrary-precision
 * integers, floats) sit on a red-black tree. Both iterate in ascending order.
 */

import {
  CHAR_BITS,
  INT16_BITS,
  INT32_BITS,
  INT64_MAX,
  INT64_MIN,
  INT8_BITS,
  MAX_CODE_POINT,
  UINT32_MAX,
  UINT64_MAX,
  topShift,
} from './internal/constants';
import {
  intEmpty,
  intGet,
  intSet,
  intDelete,
  intIter,
  intMergeWithKey,
  intMapMaybeWithKey,
} from './internal/intmap';
import {
  ordEmpty,
  ordIsEmpty,
  ordGet,
  ordSet,
  ordDelete,
  ordIter,
  ordMergeWithKey,
  ordMapMaybeWithKey,
} from './internal/ordmap';
import { KeyDomainError, ShapeMismatchError } from './errors';
import type { Focus, IntMap, OrdKey, OrdMap, Owner, TrieKey, TrieNode } from './internal/types';

function asInt<V>(node: TrieNode<V>): IntMap<V> {
  if (node.kind !== 'int') throw new ShapeMismatchError('int', node.kind);
  return node;
}

function asOrdered<V>(node: TrieNode<V>): OrdMap<V> {
  if (node.kind !== 'ordered') throw new ShapeMismatchError('ordered', node.kind);
  return node;
}

// =====================================================
// Dense leaves
// =====================================================

class DenseKey<K> implements TrieKey<K> {
  private readonly shift: number;

  constructor(
    readonly name: string,
    bits: number,
    private readonly toIndex: (key: K) => number,
    private readonly fromIndex: (index: number) => K
  ) {
    this.shift = topShift(bits);
  }

  empty<V>(): TrieNode<V> {
    return intEmpty<V>(this.shift);
  }

  isNull<V>(trie: TrieNode<V>): boolean {
    return asInt(trie).root === null;
  }

  focus<V>(key: K, trie: TrieNode<V>, owner?: Owner): Focus<V> {
    const map = asInt(trie);
    const index = this.toIndex(key);
    return {
      value: intGet(map, index),
      set: (value) => (value === undefined ? intDelete(map, owner, index) : intSet(map, owner, index, value)),
    };
  }

  mergeWithKey<A, B, C>(
    combine: (key: K, left: A, right: B) => C | undefined,
    onlyLeft: (trie: TrieNode<A>) => TrieNode<C>,
    onlyRight: (trie: TrieNode<B>) => TrieNode<C>,
    left: TrieNode<A>,
    right: TrieNode<B>
  ): TrieNode<C> {
    return intMergeWithKey(
      (index, a: A, b: B) => combine(this.fromIndex(index), a, b),
      (map) => asInt(onlyLeft(map)),
      (map) => asInt(onlyRight(map)),
      asInt(left),
      asInt(right)
    );
  }

  mapMaybeWithKey<A, B>(f: (key: K, value: A) => B | undefined, trie: TrieNode<A>): TrieNode<B> {
    return intMapMaybeWithKey((index, value: A) => f(this.fromIndex(index), value), asInt(trie));
  }

  *entries<V>(trie: TrieNode<V>): IterableIterator<[K, V]> {
    for (const [index, value] of intIter(asInt(trie))) {
      yield [this.fromIndex(index), value];
    }
  }
}

function integerKey(name: string, min: number, max: number, bits: number): TrieKey<number> {
  return new DenseKey<number>(
    name,
    bits,
    (key) => {
      if (!Number.isInteger(key) || key < min || key > max) throw new KeyDomainError(name, key);
      return key - min;
    },
    (index) => index + min
  );
}

export const int8 = integerKey('int8', -0x80, 0x7f, INT8_BITS);
export const int16 = integerKey('int16', -0x8000, 0x7fff, INT16_BITS);
export const int32 = integerKey('int32', -0x80000000, 0x7fffffff, INT32_BITS);
export const uint8 = integerKey('uint8', 0, 0xff, INT8_BITS);
export const uint16 = integerKey('uint16', 0, 0xffff, INT16_BITS);

/** Alias of `uint8`. */
export const byte = uint8;

/** One Unicode code point, given as a string. */
export const char: TrieKey<string> = new DenseKey<string>(
  'char',
  CHAR_BITS,
  (key) => {
    const cp = key.codePointAt(0);
    if (cp === undefined || key.length !== (cp > 0xffff ? 2 : 1) || cp > MAX_CODE_POINT) {
      throw new KeyDomainError('char', key);
    }
    return cp;
  },
  (index) => String.fromCodePoint(index)
);

// =====================================================
// Sparse leaves
// =====================================================

class SparseKey<K extends OrdKey> implements TrieKey<K> {
  constructor(
    readonly name: string,
    private readonly normalize: (key: K) => K,
    private readonly fromOrd: (key: OrdKey) => K
  ) {}

  empty<V>(): TrieNode<V> {
    return ordEmpty<V>();
  }

  isNull<V>(trie: TrieNode<V>): boolean {
    return ordIsEmpty(asOrdered(trie));
  }

  focus<V>(key: K, trie: TrieNode<V>): Focus<V> {
    const map = asOrdered(trie);
    const k = this.normalize(key);
    return {
      value: ordGet(map, k),
      set: (value) => (value === undefined ? ordDelete(map, k) : ordSet(map, k, value)),
    };
  }

  mergeWithKey<A, B, C>(
    combine: (key: K, left: A, right: B) => C | undefined,
    onlyLeft: (trie: TrieNode<A>) => TrieNode<C>,
    onlyRight: (trie: TrieNode<B>) => TrieNode<C>,
    left: TrieNode<A>,
    right: TrieNode<B>
  ): TrieNode<C> {
    return ordMergeWithKey(
      (key, a: A, b: B) => combine(this.fromOrd(key), a, b),
      (map) => asOrdered(onlyLeft(map)),
      (map) => asOrdered(onlyRight(map)),
      asOrdered(left),
      asOrdered(right)
    );
  }

  mapMaybeWithKey<A, B>(f: (key: K, value: A) => B | undefined, trie: TrieNode<A>): TrieNode<B> {
    return ordMapMaybeWithKey((key, value: A) => f(this.fromOrd(key), value), asOrdered(trie));
  }

  *entries<V>(trie: TrieNode<V>): IterableIterator<[K, V]> {
    for (const [key, value] of ordIter(asOrdered(trie))) {
      yield [this.fromOrd(key), value];
    }
  }
}

const toNumber = (key: OrdKey): number => (typeof key === 'number' ? key : Number(key));
const toBigInt = (key: OrdKey): bigint => (typeof key === 'bigint' ? key : BigInt(key));

function bigintKey(name: string, min?: bigint, max?: bigint): TrieKey<bigint> {
  return new SparseKey<bigint>(
    name,
    (key) => {
      if (typeof key !== 'bigint') throw new KeyDomainError(name, key);
      if ((min !== undefined && key < min) || (max !== undefined && key > max)) {
        throw new KeyDomainError(name, key);
      }
      return key;
    },
    toBigInt
  );
}

export const uint32: TrieKey<number> = new SparseKey<number>(
  'uint32',
  (key) => {
    if (!Number.isInteger(key) || key < 0 || key > UINT32_MAX) throw new KeyDomainError('uint32', key);
    return key;
  },
  toNumber
);

/** Any number except NaN; `-0` and `0` are the same key. */
export const float64: TrieKey<number> = new SparseKey<number>(
  'float64',
  (key) => {
    if (typeof key !== 'number' || Number.isNaN(key)) throw new KeyDomainError('float64', key);
    return key === 0 ? 0 : key;
  },
  toNumber
);

export const int64 = bigintKey('int64', INT64_MIN, INT64_MAX);
export const uint64 = bigintKey('uint64', 0n, UINT64_MAX);

/** Arbitrary-precision integers. */
export const integer = bigintKey('integer');
