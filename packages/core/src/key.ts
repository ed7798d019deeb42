/**
 * Per-type facade: binds a concrete key type to the shape of its
 * representation and forwards every operation to the generic engine.
 */

import * as engine from './engine';
import type { Shape } from './shape';
import type { Focus, Owner, TrieKey, TrieNode } from './internal/types';

class ShapedKey<K, R> implements TrieKey<K> {
  constructor(
    readonly name: string,
    private readonly shape: Shape<R>,
    private readonly from: (key: K) => R,
    private readonly to: (rep: R) => K
  ) {}

  empty<V>(): TrieNode<V> {
    return engine.empty<R, V>(this.shape);
  }

  isNull<V>(trie: TrieNode<V>): boolean {
    return engine.isNull(this.shape, trie);
  }

  focus<V>(key: K, trie: TrieNode<V>, owner?: Owner): Focus<V> {
    return engine.focus(this.shape, this.from(key), trie, owner);
  }

  mergeWithKey<A, B, C>(
    combine: (key: K, left: A, right: B) => C | undefined,
    onlyLeft: (trie: TrieNode<A>) => TrieNode<C>,
    onlyRight: (trie: TrieNode<B>) => TrieNode<C>,
    left: TrieNode<A>,
    right: TrieNode<B>
  ): TrieNode<C> {
    return engine.mergeWithKey(
      this.shape,
      (rep: R, a: A, b: B) => combine(this.to(rep), a, b),
      onlyLeft,
      onlyRight,
      left,
      right
    );
  }

  mapMaybeWithKey<A, B>(f: (key: K, value: A) => B | undefined, trie: TrieNode<A>): TrieNode<B> {
    return engine.mapMaybeWithKey(this.shape, (rep: R, value: A) => f(this.to(rep), value), trie);
  }

  *entries<V>(trie: TrieNode<V>): IterableIterator<[K, V]> {
    for (const [rep, value] of engine.entries(this.shape, trie)) {
      yield [this.to(rep), value];
    }
  }
}

/**
 * Declares a key type by its shape.
 *
 * @example
 * ```ts
 * type Shade = { kind: 'grey' } | { kind: 'rgb'; r: number; g: number; b: number };
 *
 * const shade = defineKey<Shade, Either<Unit, readonly [number, readonly [number, number]]>>(
 *   'shade',
 *   sum(unit, product(field(uint8), product(field(uint8), field(uint8)))),
 *   (s) => (s.kind === 'grey' ? left(UNIT) : right([s.r, [s.g, s.b]])),
 *   (rep) => rep.tag === 'left'
 *     ? { kind: 'grey' }
 *     : { kind: 'rgb', r: rep.value[0], g: rep.value[1][0], b: rep.value[1][1] }
 * );
 * ```
 */
export function defineKey<K, R>(
  name: string,
  shape: Shape<R>,
  from: (key: K) => R,
  to: (rep: R) => K
): TrieKey<K> {
  return new ShapedKey(name, shape, from, to);
}

/** A key type whose representation is the shape's own. */
export function shapeKey<R>(name: string, shape: Shape<R>): TrieKey<R> {
  return new ShapedKey<R, R>(name, shape, (key) => key, (rep) => rep);
}
