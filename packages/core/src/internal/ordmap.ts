/**
 * Sparse ordered map for unbounded key domains
 * Thin persistent layer over functional-red-black-tree
 */

import createRBTree from 'functional-red-black-tree';
import type { OrdKey, OrdMap, OrdTree } from './types';

export function compareOrdKeys(a: OrdKey, b: OrdKey): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function withTree<V>(tree: OrdTree<V>): OrdMap<V> {
  return { kind: 'ordered', tree };
}

export function ordEmpty<V>(): OrdMap<V> {
  return withTree(createRBTree<OrdKey, V>(compareOrdKeys));
}

export function ordIsEmpty<V>(map: OrdMap<V>): boolean {
  return map.tree.length === 0;
}

export function ordGet<V>(map: OrdMap<V>, key: OrdKey): V | undefined {
  return map.tree.get(key);
}

// The tree keeps duplicate keys, so an existing entry is updated in place
export function ordSet<V>(map: OrdMap<V>, key: OrdKey, value: V): OrdMap<V> {
  const it = map.tree.find(key);
  if (it.valid) {
    if (it.value === value) return map;
    return withTree(it.update(value));
  }
  return withTree(map.tree.insert(key, value));
}

export function ordDelete<V>(map: OrdMap<V>, key: OrdKey): OrdMap<V> {
  const it = map.tree.find(key);
  if (!it.valid) return map;
  return withTree(it.remove());
}

export function* ordIter<V>(map: OrdMap<V>): IterableIterator<[OrdKey, V]> {
  for (const it = map.tree.begin; it.valid; it.next()) {
    const key = it.key;
    const value = it.value;
    if (key !== undefined && value !== undefined) yield [key, value];
  }
}

export function ordMapMaybeWithKey<A, B>(
  f: (key: OrdKey, value: A) => B | undefined,
  map: OrdMap<A>
): OrdMap<B> {
  let tree = createRBTree<OrdKey, B>(compareOrdKeys);
  for (const [key, value] of ordIter(map)) {
    const next = f(key, value);
    if (next !== undefined) tree = tree.insert(key, next);
  }
  return withTree(tree);
}

/**
 * Merge-join of two maps. Keys on one side only are gathered into one map
 * per side and handed to the matching one-sided transform in a single call.
 */
export function ordMergeWithKey<A, B, C>(
  combine: (key: OrdKey, left: A, right: B) => C | undefined,
  onlyLeft: (map: OrdMap<A>) => OrdMap<C>,
  onlyRight: (map: OrdMap<B>) => OrdMap<C>,
  left: OrdMap<A>,
  right: OrdMap<B>
): OrdMap<C> {
  if (ordIsEmpty(right)) return onlyLeft(left);
  if (ordIsEmpty(left)) return onlyRight(right);

  let leftOnly = createRBTree<OrdKey, A>(compareOrdKeys);
  let rightOnly = createRBTree<OrdKey, B>(compareOrdKeys);
  let out = createRBTree<OrdKey, C>(compareOrdKeys);

  const li = ordIter(left);
  const ri = ordIter(right);
  let l = li.next();
  let r = ri.next();

  while (!l.done && !r.done) {
    const [lk, lv] = l.value;
    const [rk, rv] = r.value;
    const order = compareOrdKeys(lk, rk);
    if (order < 0) {
      leftOnly = leftOnly.insert(lk, lv);
      l = li.next();
    } else if (order > 0) {
      rightOnly = rightOnly.insert(rk, rv);
      r = ri.next();
    } else {
      const value = combine(lk, lv, rv);
      if (value !== undefined) out = out.insert(lk, value);
      l = li.next();
      r = ri.next();
    }
  }
  for (; !l.done; l = li.next()) leftOnly = leftOnly.insert(l.value[0], l.value[1]);
  for (; !r.done; r = ri.next()) rightOnly = rightOnly.insert(r.value[0], r.value[1]);

  if (leftOnly.length > 0) {
    for (const [key, value] of ordIter(onlyLeft(withTree(leftOnly)))) out = out.insert(key, value);
  }
  if (rightOnly.length > 0) {
    for (const [key, value] of ordIter(onlyRight(withTree(rightOnly)))) out = out.insert(key, value);
  }
  return withTree(out);
}
