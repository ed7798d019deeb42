/**
 * Core type definitions
 */

import type createRBTree from 'functional-red-black-tree';

// Transient owner for structural sharing
export type Owner = object | undefined;

// Dense trie: branches above the last level, buckets of values on it
export interface IntBranch<V> {
  kind: 'branch';
  owner?: Owner;
  bitmap: number;
  children: IntChild<V>[];
}

export interface IntBucket<V> {
  kind: 'bucket';
  owner?: Owner;
  bitmap: number;
  values: V[];
}

export type IntChild<V> = IntBranch<V> | IntBucket<V>;

export interface IntMap<V> {
  readonly kind: 'int';
  readonly root: IntChild<V> | null;
  readonly shift: number;
}

// Sparse trie: persistent red-black tree
export type OrdKey = number | bigint;
export type OrdTree<V> = createRBTree.Tree<OrdKey, V>;

export interface OrdMap<V> {
  readonly kind: 'ordered';
  readonly tree: OrdTree<V>;
}

// Shape-indexed nodes
export interface VoidTrie {
  readonly kind: 'void';
}

export interface UnitTrie<V> {
  readonly kind: 'unit';
  readonly value: V | undefined;
}

export interface ProductTrie<V> {
  readonly kind: 'product';
  readonly outer: TrieNode<TrieNode<V>>;
}

export interface SumTrie<V> {
  readonly kind: 'sum';
  readonly left: TrieNode<V>;
  readonly right: TrieNode<V>;
}

export type TrieNode<V> =
  | VoidTrie
  | UnitTrie<V>
  | ProductTrie<V>
  | SumTrie<V>
  | IntMap<V>
  | OrdMap<V>;

/**
 * Combined read/write access at one key.
 * `set(undefined)` clears the slot; the input trie is never modified
 * unless its nodes belong to the owner the focus was opened with.
 */
export interface Focus<V> {
  readonly value: V | undefined;
  set(value: V | undefined): TrieNode<V>;
}

/**
 * Operations every key type provides, whether a leaf domain or a
 * shape-derived composite. `undefined` stands for "no value" throughout.
 *
 * `mergeWithKey` precondition: `onlyLeft` and `onlyRight` must return a trie
 * whose keys are a subset of their input's. Nothing checks this unless merge
 * verification is switched on; a violation breaks emptiness and equality.
 */
export interface TrieKey<K> {
  readonly name: string;
  empty<V>(): TrieNode<V>;
  isNull<V>(trie: TrieNode<V>): boolean;
  focus<V>(key: K, trie: TrieNode<V>, owner?: Owner): Focus<V>;
  mergeWithKey<A, B, C>(
    combine: (key: K, left: A, right: B) => C | undefined,
    onlyLeft: (trie: TrieNode<A>) => TrieNode<C>,
    onlyRight: (trie: TrieNode<B>) => TrieNode<C>,
    left: TrieNode<A>,
    right: TrieNode<B>
  ): TrieNode<C>;
  mapMaybeWithKey<A, B>(f: (key: K, value: A) => B | undefined, trie: TrieNode<A>): TrieNode<B>;
  entries<V>(trie: TrieNode<V>): IterableIterator<[K, V]>;
}
