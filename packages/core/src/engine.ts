/**
 * Generic trie engine
 *
 * Every operation is written once per shape form and recurses over
 * (shape, node) in lockstep until it reaches a field's key type.
 *
 * Product nodes never hold an empty inner trie: each write or merge that
 * leaves one empty drops its outer key instead.
 */

import { UnreachableKeyError } from './errors';
import type { Shape } from './shape';
import {
  EMPTY_UNIT,
  VOID_TRIE,
  asProduct,
  asSum,
  asUnit,
  productNode,
  sumNode,
  unitNode,
} from './internal/nodes';
import type { Focus, Owner, TrieNode } from './internal/types';

function nonNull<R, V>(shape: Shape<R>, node: TrieNode<V>): TrieNode<V> | undefined {
  return isNull(shape, node) ? undefined : node;
}

// =====================================================
// Construction & inspection
// =====================================================

export function empty<R, V>(shape: Shape<R>): TrieNode<V> {
  switch (shape.kind) {
    case 'void':
      return VOID_TRIE;
    case 'unit':
      return EMPTY_UNIT;
    case 'field':
      return shape.target().empty<V>();
    case 'product':
      return productNode<V>(empty<unknown, TrieNode<V>>(shape.first));
    case 'sum':
      return sumNode<V>(empty<unknown, V>(shape.left), empty<unknown, V>(shape.right));
  }
}

export function isNull<R, V>(shape: Shape<R>, node: TrieNode<V>): boolean {
  switch (shape.kind) {
    case 'void':
      return true;
    case 'unit':
      return asUnit(node).value === undefined;
    case 'field':
      return shape.target().isNull(node);
    case 'product':
      return isNull(shape.first, asProduct(node).outer);
    case 'sum': {
      const s = asSum(node);
      return isNull(shape.left, s.left) && isNull(shape.right, s.right);
    }
  }
}

// =====================================================
// Point access
// =====================================================

export function focus<R, V>(shape: Shape<R>, key: R, node: TrieNode<V>, owner?: Owner): Focus<V> {
  switch (shape.kind) {
    case 'void':
      throw new UnreachableKeyError('focus');

    case 'unit': {
      const u = asUnit(node);
      return {
        value: u.value,
        set: (value) => (value === u.value ? u : unitNode(value)),
      };
    }

    case 'field':
      return shape.target().focus(key, node, owner);

    case 'product': {
      const p = asProduct(node);
      const [a, b] = shape.split(key);
      const outer = focus(shape.first, a, p.outer, owner);
      const inner = outer.value ?? empty<unknown, V>(shape.second);
      const at = focus(shape.second, b, inner, owner);
      return {
        value: at.value,
        set: (value) => {
          const next = at.set(value);
          if (next === inner) return p;
          return productNode(outer.set(nonNull(shape.second, next)));
        },
      };
    }

    case 'sum': {
      const s = asSum(node);
      const choice = shape.match(key);
      if (choice.tag === 'left') {
        const at = focus(shape.left, choice.value, s.left, owner);
        return {
          value: at.value,
          set: (value) => {
            const next = at.set(value);
            return next === s.left ? s : sumNode(next, s.right);
          },
        };
      }
      const at = focus(shape.right, choice.value, s.right, owner);
      return {
        value: at.value,
        set: (value) => {
          const next = at.set(value);
          return next === s.right ? s : sumNode(s.left, next);
        },
      };
    }
  }
}

// =====================================================
// Merge
// =====================================================

/**
 * Zips two tries of the same shape.
 *
 * Keys on both sides go through `combine`. Keys on one side only are handed
 * to `onlyLeft` / `onlyRight` as whole sub-tries of the full key type, which
 * must not add keys their input lacks.
 */
export function mergeWithKey<R, A, B, C>(
  shape: Shape<R>,
  combine: (key: R, left: A, right: B) => C | undefined,
  onlyLeft: (node: TrieNode<A>) => TrieNode<C>,
  onlyRight: (node: TrieNode<B>) => TrieNode<C>,
  t1: TrieNode<A>,
  t2: TrieNode<B>
): TrieNode<C> {
  switch (shape.kind) {
    case 'void':
      return VOID_TRIE;

    case 'unit': {
      const u1 = asUnit(t1);
      const u2 = asUnit(t2);
      if (u1.value !== undefined && u2.value !== undefined) {
        return unitNode(combine(shape.unitKey(), u1.value, u2.value));
      }
      if (u1.value !== undefined) return onlyLeft(u1);
      if (u2.value !== undefined) return onlyRight(u2);
      return EMPTY_UNIT;
    }

    case 'field':
      return shape.target().mergeWithKey(combine, onlyLeft, onlyRight, t1, t2);

    case 'product': {
      const { first, second } = shape;

      // A one-sided inner trie under outer key `a`: rebuild the singleton
      // product trie the caller's transform expects, then read `a` back.
      const inner = <X>(a: unknown, transform: (node: TrieNode<X>) => TrieNode<C>) =>
        (node: TrieNode<X>): TrieNode<C> => {
          const single = productNode(focus(first, a, empty<unknown, TrieNode<X>>(first)).set(node));
          const result = asProduct(transform(single)).outer;
          return focus(first, a, result).value ?? empty<unknown, C>(second);
        };

      const outer = mergeWithKey<unknown, TrieNode<A>, TrieNode<B>, TrieNode<C>>(
        first,
        (a, x, y) =>
          nonNull(
            second,
            mergeWithKey(
              second,
              (b, v1: A, v2: B) => combine(shape.join(a, b), v1, v2),
              inner(a, onlyLeft),
              inner(a, onlyRight),
              x,
              y
            )
          ),
        (node) => asProduct(onlyLeft(productNode(node))).outer,
        (node) => asProduct(onlyRight(productNode(node))).outer,
        asProduct(t1).outer,
        asProduct(t2).outer
      );
      return productNode(outer);
    }

    case 'sum': {
      const s1 = asSum(t1);
      const s2 = asSum(t2);
      const { left, right } = shape;
      return sumNode(
        mergeWithKey(
          left,
          (a, v1: A, v2: B) => combine(shape.inl(a), v1, v2),
          (node) => asSum(onlyLeft(sumNode(node, empty<unknown, A>(right)))).left,
          (node) => asSum(onlyRight(sumNode(node, empty<unknown, B>(right)))).left,
          s1.left,
          s2.left
        ),
        mergeWithKey(
          right,
          (b, v1: A, v2: B) => combine(shape.inr(b), v1, v2),
          (node) => asSum(onlyLeft(sumNode(empty<unknown, A>(left), node))).right,
          (node) => asSum(onlyRight(sumNode(empty<unknown, B>(left), node))).right,
          s1.right,
          s2.right
        )
      );
    }
  }
}

// =====================================================
// Filter-map
// =====================================================

export function mapMaybeWithKey<R, A, B>(
  shape: Shape<R>,
  f: (key: R, value: A) => B | undefined,
  node: TrieNode<A>
): TrieNode<B> {
  switch (shape.kind) {
    case 'void':
      return VOID_TRIE;

    case 'unit': {
      const { value } = asUnit(node);
      return value === undefined ? EMPTY_UNIT : unitNode(f(shape.unitKey(), value));
    }

    case 'field':
      return shape.target().mapMaybeWithKey(f, node);

    case 'product': {
      const { first, second } = shape;
      return productNode(
        mapMaybeWithKey(
          first,
          (a, inner: TrieNode<A>) =>
            nonNull(second, mapMaybeWithKey(second, (b, value: A) => f(shape.join(a, b), value), inner)),
          asProduct(node).outer
        )
      );
    }

    case 'sum': {
      const s = asSum(node);
      return sumNode(
        mapMaybeWithKey(shape.left, (a, value: A) => f(shape.inl(a), value), s.left),
        mapMaybeWithKey(shape.right, (b, value: A) => f(shape.inr(b), value), s.right)
      );
    }
  }
}

// =====================================================
// Ordered traversal
// =====================================================

/**
 * Entries in key order: products lexicographically, the left alternative of
 * a sum before the right one, leaves in their natural order.
 */
export function* entries<R, V>(shape: Shape<R>, node: TrieNode<V>): IterableIterator<[R, V]> {
  switch (shape.kind) {
    case 'void':
      return;

    case 'unit': {
      const { value } = asUnit(node);
      if (value !== undefined) yield [shape.unitKey(), value];
      return;
    }

    case 'field':
      yield* shape.target().entries(node);
      return;

    case 'product':
      for (const [a, inner] of entries(shape.first, asProduct(node).outer)) {
        for (const [b, value] of entries(shape.second, inner)) {
          yield [shape.join(a, b), value];
        }
      }
      return;

    case 'sum': {
      const s = asSum(node);
      for (const [a, value] of entries(shape.left, s.left)) yield [shape.inl(a), value];
      for (const [b, value] of entries(shape.right, s.right)) yield [shape.inr(b), value];
      return;
    }
  }
}
