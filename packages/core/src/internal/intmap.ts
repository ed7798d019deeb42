/**
 * Dense integer trie
 * Fixed-depth bitmap-indexed trie over unsigned indices. Chunks are read
 * from the most significant end, so slot order is index order.
 */

import { BITS, MASK } from './constants';
import { popcount, bitSlots } from './utils';
import { ShapeMismatchError } from '../errors';
import type { IntBranch, IntBucket, IntChild, IntMap, Owner } from './types';

export function intEmpty<V>(shift: number): IntMap<V> {
  return { kind: 'int', root: null, shift };
}

function withRoot<V>(root: IntChild<V> | null, shift: number): IntMap<V> {
  return { kind: 'int', root, shift };
}

function slotOf(index: number, shift: number): number {
  return (index >>> shift) & MASK;
}

function packedIndex(bitmap: number, bit: number): number {
  return popcount(bitmap & (bit - 1));
}

function ensureEditableBranch<V>(node: IntBranch<V>, owner: Owner): IntBranch<V> {
  if (owner && node.owner === owner) return node;
  return {
    kind: 'branch',
    owner,
    bitmap: node.bitmap,
    children: node.children.slice(),
  };
}

function ensureEditableBucket<V>(node: IntBucket<V>, owner: Owner): IntBucket<V> {
  if (owner && node.owner === owner) return node;
  return {
    kind: 'bucket',
    owner,
    bitmap: node.bitmap,
    values: node.values.slice(),
  };
}

function intInsert<V>(
  node: IntChild<V> | null,
  owner: Owner,
  shift: number,
  index: number,
  value: V
): IntChild<V> {
  const bit = 1 << slotOf(index, shift);

  if (!node) {
    if (shift === 0) {
      return { kind: 'bucket', owner, bitmap: bit, values: [value] };
    }
    return {
      kind: 'branch',
      owner,
      bitmap: bit,
      children: [intInsert(null, owner, shift - BITS, index, value)],
    };
  }

  const packed = packedIndex(node.bitmap, bit);
  const hasSlot = (node.bitmap & bit) !== 0;

  if (node.kind === 'bucket') {
    if (hasSlot && node.values[packed] === value) return node;
    const editable = ensureEditableBucket(node, owner);
    if (hasSlot) {
      editable.values[packed] = value;
    } else {
      editable.bitmap |= bit;
      editable.values.splice(packed, 0, value);
    }
    return editable;
  }

  const child = hasSlot ? node.children[packed] : null;
  const next = intInsert(child, owner, shift - BITS, index, value);
  if (next === child) return node;

  const editable = ensureEditableBranch(node, owner);
  if (hasSlot) {
    editable.children[packed] = next;
  } else {
    editable.bitmap |= bit;
    editable.children.splice(packed, 0, next);
  }
  return editable;
}

function intRemove<V>(
  node: IntChild<V>,
  owner: Owner,
  shift: number,
  index: number
): IntChild<V> | null {
  const bit = 1 << slotOf(index, shift);
  if ((node.bitmap & bit) === 0) return node;
  const packed = packedIndex(node.bitmap, bit);

  if (node.kind === 'bucket') {
    if (node.bitmap === bit) return null;
    const editable = ensureEditableBucket(node, owner);
    editable.bitmap ^= bit;
    editable.values.splice(packed, 1);
    return editable;
  }

  const child = node.children[packed];
  const next = intRemove(child, owner, shift - BITS, index);
  if (next === child) return node;

  if (next === null) {
    if (node.bitmap === bit) return null;
    const editable = ensureEditableBranch(node, owner);
    editable.bitmap ^= bit;
    editable.children.splice(packed, 1);
    return editable;
  }

  const editable = ensureEditableBranch(node, owner);
  editable.children[packed] = next;
  return editable;
}

export function intGet<V>(map: IntMap<V>, index: number): V | undefined {
  let node = map.root;
  let shift = map.shift;

  while (node) {
    const bit = 1 << slotOf(index, shift);
    if ((node.bitmap & bit) === 0) return undefined;
    const packed = packedIndex(node.bitmap, bit);
    if (node.kind === 'bucket') return node.values[packed];
    node = node.children[packed];
    shift -= BITS;
  }

  return undefined;
}

export function intSet<V>(map: IntMap<V>, owner: Owner, index: number, value: V): IntMap<V> {
  const root = intInsert(map.root, owner, map.shift, index, value);
  if (root === map.root) return map;
  return withRoot(root, map.shift);
}

export function intDelete<V>(map: IntMap<V>, owner: Owner, index: number): IntMap<V> {
  if (!map.root) return map;
  const root = intRemove(map.root, owner, map.shift, index);
  if (root === map.root) return map;
  return withRoot(root, map.shift);
}

function* iterNode<V>(node: IntChild<V>, shift: number, prefix: number): IterableIterator<[number, V]> {
  let i = 0;
  for (const slot of bitSlots(node.bitmap)) {
    const index = prefix + slot * 2 ** shift;
    if (node.kind === 'bucket') {
      yield [index, node.values[i]];
    } else {
      yield* iterNode(node.children[i], shift - BITS, index);
    }
    i++;
  }
}

export function* intIter<V>(map: IntMap<V>): IterableIterator<[number, V]> {
  if (map.root) yield* iterNode(map.root, map.shift, 0);
}

function mapNode<A, B>(
  f: (index: number, value: A) => B | undefined,
  node: IntChild<A>,
  shift: number,
  prefix: number
): IntChild<B> | null {
  let bitmap = 0;
  let i = 0;

  if (node.kind === 'bucket') {
    const values: B[] = [];
    for (const slot of bitSlots(node.bitmap)) {
      const value = f(prefix + slot, node.values[i++]);
      if (value !== undefined) {
        bitmap |= 1 << slot;
        values.push(value);
      }
    }
    return bitmap === 0 ? null : { kind: 'bucket', bitmap, values };
  }

  const children: IntChild<B>[] = [];
  for (const slot of bitSlots(node.bitmap)) {
    const child = mapNode(f, node.children[i++], shift - BITS, prefix + slot * 2 ** shift);
    if (child) {
      bitmap |= 1 << slot;
      children.push(child);
    }
  }
  return bitmap === 0 ? null : { kind: 'branch', bitmap, children };
}

export function intMapMaybeWithKey<A, B>(
  f: (index: number, value: A) => B | undefined,
  map: IntMap<A>
): IntMap<B> {
  return withRoot(map.root && mapNode(f, map.root, map.shift, 0), map.shift);
}

// =====================================================
// Merge
// =====================================================

interface MergeOps<A, B, C> {
  combine: (index: number, left: A, right: B) => C | undefined;
  onlyLeft: (map: IntMap<A>) => IntMap<C>;
  onlyRight: (map: IntMap<B>) => IntMap<C>;
  top: number;
}

function pick<T>(bitmap: number, bits: number, items: readonly T[]): T[] {
  const out: T[] = [];
  let i = 0;
  for (const slot of bitSlots(bitmap)) {
    if ((bits & (1 << slot)) !== 0) out.push(items[i]);
    i++;
  }
  return out;
}

// Same node cut down to the slots in `bits`
function restrict<V>(node: IntChild<V>, bits: number): IntChild<V> | null {
  if (bits === 0) return null;
  if (bits === node.bitmap) return node;
  if (node.kind === 'bucket') {
    return { kind: 'bucket', bitmap: bits, values: pick(node.bitmap, bits, node.values) };
  }
  return { kind: 'branch', bitmap: bits, children: pick(node.bitmap, bits, node.children) };
}

/**
 * Runs a one-sided transform on a subtree. The subtree is re-rooted on its
 * prefix path so the transform sees a standalone map of the same key type,
 * then the result is read back along that path.
 */
function oneSided<X, C>(
  fn: (map: IntMap<X>) => IntMap<C>,
  node: IntChild<X> | null,
  top: number,
  shift: number,
  prefix: number
): IntChild<C> | null {
  if (!node) return null;

  let root: IntChild<X> = node;
  for (let s = shift + BITS; s <= top; s += BITS) {
    root = { kind: 'branch', bitmap: 1 << slotOf(prefix, s), children: [root] };
  }

  let cur = fn(withRoot(root, top)).root;
  let s = top;
  while (cur && s > shift) {
    const bit = 1 << slotOf(prefix, s);
    if ((cur.bitmap & bit) === 0) return null;
    if (cur.kind !== 'branch') throw new ShapeMismatchError('branch', cur.kind);
    cur = cur.children[packedIndex(cur.bitmap, bit)];
    s -= BITS;
  }
  return cur;
}

function scatter<T>(cells: (T | undefined)[], bitmap: number, items: readonly T[]): void {
  let i = 0;
  for (const slot of bitSlots(bitmap)) cells[slot] = items[i++];
}

function gather<T>(cells: readonly (T | undefined)[]): { bitmap: number; items: T[] } {
  let bitmap = 0;
  const items: T[] = [];
  for (let slot = 0; slot < cells.length; slot++) {
    const item = cells[slot];
    if (item !== undefined) {
      bitmap |= 1 << slot;
      items.push(item);
    }
  }
  return { bitmap, items };
}

function bucketValues<V>(node: IntChild<V>): V[] {
  if (node.kind !== 'bucket') throw new ShapeMismatchError('bucket', node.kind);
  return node.values;
}

function branchChildren<V>(node: IntChild<V>): IntChild<V>[] {
  if (node.kind !== 'branch') throw new ShapeMismatchError('branch', node.kind);
  return node.children;
}

function mergeNodes<A, B, C>(
  ops: MergeOps<A, B, C>,
  l: IntChild<A>,
  r: IntChild<B>,
  shift: number,
  prefix: number
): IntChild<C> | null {
  const both = l.bitmap & r.bitmap;
  const leftPart = oneSided(ops.onlyLeft, restrict(l, l.bitmap & ~both), ops.top, shift, prefix);
  const rightPart = oneSided(ops.onlyRight, restrict(r, r.bitmap & ~both), ops.top, shift, prefix);

  if (shift === 0) {
    const lValues = bucketValues(l);
    const rValues = bucketValues(r);
    const cells: (C | undefined)[] = [];
    if (leftPart) scatter(cells, leftPart.bitmap, bucketValues(leftPart));
    if (rightPart) scatter(cells, rightPart.bitmap, bucketValues(rightPart));
    for (const slot of bitSlots(both)) {
      const bit = 1 << slot;
      cells[slot] = ops.combine(
        prefix + slot,
        lValues[packedIndex(l.bitmap, bit)],
        rValues[packedIndex(r.bitmap, bit)]
      );
    }
    const { bitmap, items } = gather(cells);
    return bitmap === 0 ? null : { kind: 'bucket', bitmap, values: items };
  }

  const lChildren = branchChildren(l);
  const rChildren = branchChildren(r);
  const cells: (IntChild<C> | undefined)[] = [];
  if (leftPart) scatter(cells, leftPart.bitmap, branchChildren(leftPart));
  if (rightPart) scatter(cells, rightPart.bitmap, branchChildren(rightPart));
  for (const slot of bitSlots(both)) {
    const bit = 1 << slot;
    const child = mergeNodes(
      ops,
      lChildren[packedIndex(l.bitmap, bit)],
      rChildren[packedIndex(r.bitmap, bit)],
      shift - BITS,
      prefix + slot * 2 ** shift
    );
    cells[slot] = child ?? undefined;
  }
  const { bitmap, items } = gather(cells);
  return bitmap === 0 ? null : { kind: 'branch', bitmap, children: items };
}

export function intMergeWithKey<A, B, C>(
  combine: (index: number, left: A, right: B) => C | undefined,
  onlyLeft: (map: IntMap<A>) => IntMap<C>,
  onlyRight: (map: IntMap<B>) => IntMap<C>,
  left: IntMap<A>,
  right: IntMap<B>
): IntMap<C> {
  if (left.shift !== right.shift) {
    throw new ShapeMismatchError(`${left.shift}-shift int`, `${right.shift}-shift int`);
  }
  if (!right.root) return onlyLeft(left);
  if (!left.root) return onlyRight(right);
  const ops: MergeOps<A, B, C> = { combine, onlyLeft, onlyRight, top: left.shift };
  return withRoot(mergeNodes(ops, left.root, right.root, left.shift, 0), left.shift);
}
