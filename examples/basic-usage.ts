/**
 * Basic usage - Trie, produce() and merges
 */

import { Trie, produce, string, pair, uint8, unions } from '../packages/core/src/index';

console.log('=== shape-trie: Persistent Tries ===\n');

// ===== Build a trie =====
console.log('1️⃣ Build a trie keyed by strings');
const words = Trie.fromEntries(string, [
  ['banana', 3],
  ['apple', 5],
  ['app', 1],
]);
console.log('Entries:', words.toArray());
console.log('✅ Iterates in dictionary order\n');

// ===== Persistent updates =====
console.log('2️⃣ Persistent updates');
const more = words.set('cherry', 7).remove('app');
console.log('words:', words.toArray());
console.log('more:', more.toArray());
console.log('words.set("apple", 5) === words:', words.set('apple', 5) === words);
console.log('✅ Old versions stay intact, no-op writes return the same instance\n');

// ===== Batch edits =====
console.log('3️⃣ Batch edits with produce()');
const batched = produce(words, draft => {
  draft.set('date', 2);
  draft.update('apple', n => (n ?? 0) + 10);
  draft.remove('banana');
});
console.log('Result:', batched.toArray());
console.log('Unchanged batch returns base:', produce(words, () => {}) === words);
console.log('✅ One transient pass, persistent result\n');

// ===== Composite keys =====
console.log('4️⃣ Composite keys');
const grid = Trie.fromEntries(pair(uint8, uint8), [
  [[2, 1], 'r'],
  [[1, 3], 'q'],
  [[1, 2], 'p'],
]);
console.log('Lexicographic order:', grid.toArray());

// ===== Merges =====
console.log('\n5️⃣ Merges');
const a = Trie.fromEntries(string, [['x', 1], ['y', 2]]);
const b = Trie.fromEntries(string, [['y', 20], ['z', 30]]);
console.log('union (sum):', a.union(b, (l, r) => l + r).toArray());
console.log('intersection:', a.intersectionWith(b, (l, r) => [l, r]).toArray());
console.log('difference:', a.difference(b).toArray());
console.log('unions:', unions(string, [a, b, Trie.fromEntries(string, [['w', 0]])]).toArray());
console.log('a.equals(a.set("x", 1)):', a.equals(a.set('x', 1)));
