/**
 * Internal types exposed by the public entry point
 */

export type { Owner, TrieNode, Focus, TrieKey } from './types';
