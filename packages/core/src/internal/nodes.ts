/**
 * Constructors and checked casts for shape-indexed nodes
 */

import { ShapeMismatchError } from '../errors';
import type { ProductTrie, SumTrie, TrieNode, UnitTrie, VoidTrie } from './types';

export const VOID_TRIE: VoidTrie = { kind: 'void' };

export const EMPTY_UNIT: UnitTrie<never> = { kind: 'unit', value: undefined };

export function unitNode<V>(value: V | undefined): UnitTrie<V> {
  return value === undefined ? EMPTY_UNIT : { kind: 'unit', value };
}

export function productNode<V>(outer: TrieNode<TrieNode<V>>): ProductTrie<V> {
  return { kind: 'product', outer };
}

export function sumNode<V>(left: TrieNode<V>, right: TrieNode<V>): SumTrie<V> {
  return { kind: 'sum', left, right };
}

export function asUnit<V>(node: TrieNode<V>): UnitTrie<V> {
  if (node.kind !== 'unit') throw new ShapeMismatchError('unit', node.kind);
  return node;
}

export function asProduct<V>(node: TrieNode<V>): ProductTrie<V> {
  if (node.kind !== 'product') throw new ShapeMismatchError('product', node.kind);
  return node;
}

export function asSum<V>(node: TrieNode<V>): SumTrie<V> {
  if (node.kind !== 'sum') throw new ShapeMismatchError('sum', node.kind);
  return node;
}
