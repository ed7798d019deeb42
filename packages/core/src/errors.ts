/**
 * Error types raised by trie operations
 */

export class TrieError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A per-key operation reached a Void shape. No key of an uninhabited type
 * exists, so this only fires on a forged key value.
 */
export class UnreachableKeyError extends TrieError {
  constructor(operation: string) {
    super(`${operation}: no key of an uninhabited type can exist`);
  }
}

/** A leaf key outside the domain its trie covers. */
export class KeyDomainError extends TrieError {
  constructor(
    readonly keyType: string,
    readonly key: unknown
  ) {
    super(`${String(key)} is not a valid ${keyType} key`);
  }
}

/** A trie node handed to a key type that did not build it. */
export class ShapeMismatchError extends TrieError {
  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`expected a ${expected} trie node, got ${actual}`);
  }
}

/** A one-sided merge transform returned a key absent from its input. */
export class MergeContractError extends TrieError {
  constructor(
    readonly keyType: string,
    readonly side: 'left' | 'right'
  ) {
    super(`only-${side} transform of a ${keyType} merge introduced a key absent from its input`);
  }
}
