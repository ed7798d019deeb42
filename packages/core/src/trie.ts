/**
 * Persistent trie map
 *
 * Every update returns a new Trie sharing untouched subtrees with the old
 * one; an update that changes nothing returns the same instance.
 */

import { getConfig } from './config';
import { MergeContractError } from './errors';
import type { Owner, TrieKey, TrieNode } from './internal/types';

export class Trie<K, V> implements Iterable<[K, V]> {
  private constructor(
    readonly key: TrieKey<K>,
    readonly node: TrieNode<V>
  ) {}

  static empty<K, V>(key: TrieKey<K>): Trie<K, V> {
    return new Trie<K, V>(key, key.empty<V>());
  }

  /** Wraps a node built by `key`'s operations. */
  static of<K, V>(key: TrieKey<K>, node: TrieNode<V>): Trie<K, V> {
    return new Trie(key, node);
  }

  static fromEntries<K, V>(key: TrieKey<K>, entries: Iterable<readonly [K, V]>): Trie<K, V> {
    return produce(Trie.empty<K, V>(key), (draft) => {
      for (const [k, v] of entries) draft.set(k, v);
    });
  }

  private with<W>(node: TrieNode<W>): Trie<K, W> {
    return new Trie(this.key, node);
  }

  get isEmpty(): boolean {
    return this.key.isNull(this.node);
  }

  /** Number of entries. O(n). */
  get size(): number {
    let n = 0;
    for (const _ of this.key.entries(this.node)) n++;
    return n;
  }

  get(key: K): V | undefined {
    return this.key.focus(key, this.node).value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V): Trie<K, V> {
    return this.alter(key, () => value);
  }

  remove(key: K): Trie<K, V> {
    return this.alter(key, () => undefined);
  }

  /** Replaces the value at `key` if there is one. */
  update(key: K, fn: (value: V) => V): Trie<K, V> {
    return this.alter(key, (value) => (value === undefined ? undefined : fn(value)));
  }

  /** Reads, writes or clears the slot at `key` in one pass. */
  alter(key: K, fn: (value: V | undefined) => V | undefined): Trie<K, V> {
    const at = this.key.focus(key, this.node);
    const next = fn(at.value);
    if (next === at.value) return this;
    const node = at.set(next);
    return node === this.node ? this : this.with(node);
  }

  /**
   * General merge. `onlyLeft` and `onlyRight` receive the parts of each side
   * with no counterpart and must not add keys; see `configure`.
   */
  mergeWithKey<W, X>(
    other: Trie<K, W>,
    combine: (key: K, left: V, right: W) => X | undefined,
    onlyLeft: (trie: Trie<K, V>) => Trie<K, X>,
    onlyRight: (trie: Trie<K, W>) => Trie<K, X>
  ): Trie<K, X> {
    const { key } = this;
    const verify = getConfig().verifyMergeContract;
    return this.with(
      key.mergeWithKey(
        combine,
        (node: TrieNode<V>) => oneSided(key, 'left', node, onlyLeft, verify),
        (node: TrieNode<W>) => oneSided(key, 'right', node, onlyRight, verify),
        this.node,
        other.node
      )
    );
  }

  mapMaybeWithKey<W>(f: (key: K, value: V) => W | undefined): Trie<K, W> {
    return this.with(this.key.mapMaybeWithKey(f, this.node));
  }

  map<W>(f: (value: V, key: K) => W): Trie<K, W> {
    return this.mapMaybeWithKey((k, v) => f(v, k));
  }

  filter(predicate: (value: V, key: K) => boolean): Trie<K, V> {
    return this.mapMaybeWithKey((k, v) => (predicate(v, k) ? v : undefined));
  }

  /**
   * Same keys with values equal under `eq`. Runs as a merge, so the cost
   * follows the size of both tries.
   */
  equals(other: Trie<K, V>, eq: (a: V, b: V) => boolean = Object.is): boolean {
    const diff = this.key.mergeWithKey<V, V, boolean>(
      (_, a, b) => (eq(a, b) ? undefined : true),
      (node) => this.key.mapMaybeWithKey<V, boolean>(() => true, node),
      (node) => this.key.mapMaybeWithKey<V, boolean>(() => true, node),
      this.node,
      other.node
    );
    return this.key.isNull(diff);
  }

  /** Left-biased by default; `combine` decides keys present on both sides. */
  union(other: Trie<K, V>, combine: (left: V, right: V, key: K) => V = (a) => a): Trie<K, V> {
    return this.with(
      this.key.mergeWithKey<V, V, V>(
        (k, a, b) => combine(a, b, k),
        (node) => node,
        (node) => node,
        this.node,
        other.node
      )
    );
  }

  intersectionWith<W, X>(other: Trie<K, W>, combine: (left: V, right: W, key: K) => X): Trie<K, X> {
    const drop = <Y>(): TrieNode<Y> => this.key.empty<Y>();
    return this.with(
      this.key.mergeWithKey<V, W, X>((k, a, b) => combine(a, b, k), drop, drop, this.node, other.node)
    );
  }

  /** Entries of this trie whose key is absent from `other`. */
  difference<W>(other: Trie<K, W>): Trie<K, V> {
    return this.with(
      this.key.mergeWithKey<V, W, V>(
        () => undefined,
        (node) => node,
        () => this.key.empty<V>(),
        this.node,
        other.node
      )
    );
  }

  entries(): IterableIterator<[K, V]> {
    return this.key.entries(this.node);
  }

  *keys(): IterableIterator<K> {
    for (const [k] of this.entries()) yield k;
  }

  *values(): IterableIterator<V> {
    for (const [, v] of this.entries()) yield v;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  forEach(fn: (value: V, key: K) => void): void {
    for (const [k, v] of this.entries()) fn(v, k);
  }

  toArray(): [K, V][] {
    return [...this.entries()];
  }

  toString(): string {
    const body = this.toArray().map(([k, v]) => `${String(k)} => ${String(v)}`);
    return `Trie<${this.key.name}>(${body.join(', ')})`;
  }
}

function oneSided<K, A, C>(
  key: TrieKey<K>,
  side: 'left' | 'right',
  node: TrieNode<A>,
  transform: (trie: Trie<K, A>) => Trie<K, C>,
  verify: boolean
): TrieNode<C> {
  const result = transform(Trie.of(key, node)).node;
  if (verify) {
    for (const [k] of key.entries(result)) {
      if (key.focus(k, node).value === undefined) throw new MergeContractError(key.name, side);
    }
  }
  return result;
}

/** Left-biased union of any number of tries of one key type. */
export function unions<K, V>(
  key: TrieKey<K>,
  tries: Iterable<Trie<K, V>>,
  combine?: (left: V, right: V, key: K) => V
): Trie<K, V> {
  let acc = Trie.empty<K, V>(key);
  for (const trie of tries) acc = acc.union(trie, combine);
  return acc;
}

// =====================================================
// Batch edits
// =====================================================

export interface TrieDraft<K, V> {
  get(key: K): V | undefined;
  has(key: K): boolean;
  set(key: K, value: V): void;
  /** Returns whether a value was removed. */
  remove(key: K): boolean;
  update(key: K, fn: (value: V | undefined) => V | undefined): void;
}

/**
 * Applies a batch of edits. Nodes created during the recipe are edited in
 * place on later writes; the result is as persistent as any other trie.
 * Returns `base` itself when the recipe changes nothing.
 */
export function produce<K, V>(base: Trie<K, V>, recipe: (draft: TrieDraft<K, V>) => void): Trie<K, V> {
  const { key } = base;
  const owner: Owner = {};
  let node = base.node;

  const write = (k: K, fn: (value: V | undefined) => V | undefined): V | undefined => {
    const at = key.focus(k, node, owner);
    const next = fn(at.value);
    if (next !== at.value) node = at.set(next);
    return at.value;
  };

  recipe({
    get: (k) => key.focus(k, node).value,
    has: (k) => key.focus(k, node).value !== undefined,
    set: (k, v) => {
      write(k, () => v);
    },
    remove: (k) => write(k, () => undefined) !== undefined,
    update: (k, fn) => {
      write(k, fn);
    },
  });

  return node === base.node ? base : Trie.of(key, node);
}
