/**
 * Benchmark: Trie vs native Map vs Immer
 * Keys are (uint8, uint16) pairs; Map and Immer use serialized keys
 */

import { bench, describe } from 'vitest';
import { enableMapSet, produce as immerProduce } from 'immer';
import { Trie, produce, pair, uint8, uint16 } from '../packages/core/src/index';

enableMapSet();

type Cell = readonly [number, number];

// ===== Setup =====
const SIZE = 1000;
const cells: Cell[] = Array.from({ length: SIZE }, (_, i) => [i % 200, i * 37] as const);
const id = ([a, b]: Cell) => `${a},${b}`;

const cell = pair(uint8, uint16);
const trie = Trie.fromEntries(cell, cells.map((c, i) => [c, i] as const));
const nativeMap = new Map(cells.map((c, i) => [id(c), i]));

describe('Single update', () => {
  const target = cells[500];

  bench('Native Map (copy)', () => {
    const copy = new Map(nativeMap);
    copy.set(id(target), -1);
    return copy;
  });

  bench('Trie set()', () => {
    return trie.set(target, -1);
  });

  bench('Immer produce()', () => {
    return immerProduce(nativeMap, draft => {
      draft.set(id(target), -1);
    });
  });
});

// ===== Batched updates =====
describe('Update 100 keys', () => {
  const targets = cells.slice(0, 100);

  bench('Native Map (copy)', () => {
    const copy = new Map(nativeMap);
    for (const c of targets) copy.set(id(c), -1);
    return copy;
  });

  bench('Trie produce()', () => {
    return produce(trie, draft => {
      for (const c of targets) draft.set(c, -1);
    });
  });

  bench('Immer produce()', () => {
    return immerProduce(nativeMap, draft => {
      for (const c of targets) draft.set(id(c), -1);
    });
  });
});

// ===== Reads =====
describe('Read all keys', () => {
  bench('Native Map', () => {
    let sum = 0;
    for (const c of cells) sum += nativeMap.get(id(c)) ?? 0;
    return sum;
  });

  bench('Trie', () => {
    let sum = 0;
    for (const c of cells) sum += trie.get(c) ?? 0;
    return sum;
  });
});

// ===== Ordered iteration =====
describe('Iterate in key order', () => {
  bench('Native Map (sort)', () => {
    return [...nativeMap.keys()].sort();
  });

  bench('Trie', () => {
    return trie.toArray();
  });
});

// ===== Merge =====
describe('Union of two halves', () => {
  const lower = Trie.fromEntries(cell, cells.slice(0, SIZE / 2).map((c, i) => [c, i] as const));
  const upper = Trie.fromEntries(cell, cells.slice(SIZE / 2).map((c, i) => [c, i] as const));
  const lowerMap = new Map(cells.slice(0, SIZE / 2).map((c, i) => [id(c), i]));
  const upperMap = new Map(cells.slice(SIZE / 2).map((c, i) => [id(c), i]));

  bench('Native Map', () => {
    return new Map([...upperMap, ...lowerMap]);
  });

  bench('Trie union()', () => {
    return lower.union(upper);
  });
});

// ===== No changes (reference identity) =====
describe('No changes (should return same instance)', () => {
  bench('Trie produce() - no changes', () => {
    return produce(trie, () => {
      // No changes
    });
  });

  bench('Immer produce() - no changes', () => {
    return immerProduce(nativeMap, () => {
      // No changes
    });
  });
});
