/**
 * shape-trie – persistent tries over algebraic key types
 *
 * - shapes          → Void / Unit / Field / Product / Sum descriptions of a key
 * - leaves          → dense bitmap tries and red-black trees for primitive keys
 * - defineKey(...)  → a key type from a shape, usable alone or as a field
 * - Trie            → persistent map with merge, equality and ordered iteration
 * - produce(...)    → batch edits on a transient copy
 */

// Shapes
export {
  UNIT,
  left,
  right,
  voidShape,
  unit,
  field,
  product,
  sum,
  choices,
  encodeChoice,
  decodeChoice,
  type Unit,
  type Either,
  type Choice,
  type Shape,
  type VoidShape,
  type UnitShape,
  type FieldShape,
  type ProductShape,
  type SumShape,
} from './shape';

// Generic engine
export * as engine from './engine';

// Key types
export { defineKey, shapeKey } from './key';
export {
  int8,
  int16,
  int32,
  uint8,
  uint16,
  byte,
  char,
  uint32,
  float64,
  int64,
  uint64,
  integer,
} from './leaves';
export {
  voidKey,
  unitKey,
  enumeration,
  boolean,
  ordering,
  maybe,
  either,
  pair,
  triple,
  quadruple,
  quintuple,
  sextuple,
  septuple,
  list,
  string,
} from './keys';

// Tries
export { Trie, unions, produce, type TrieDraft } from './trie';

// Errors
export {
  TrieError,
  UnreachableKeyError,
  KeyDomainError,
  ShapeMismatchError,
  MergeContractError,
} from './errors';

// Configuration
export { configure, getConfig, resetConfig, type TrieConfig } from './config';

// Types
export type { TrieKey, TrieNode, Focus, Owner } from './internal';
