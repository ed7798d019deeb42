/**
 * Core constants for shape-trie data structures
 */

// Bit-trie parameters (32-way branching)
export const BITS = 5;
export const BRANCH_FACTOR = 1 << BITS; // 32
export const MASK = BRANCH_FACTOR - 1;  // 31

// Index widths of the dense leaf domains
export const INT8_BITS = 8;
export const INT16_BITS = 16;
export const INT32_BITS = 32;
export const CHAR_BITS = 21; // U+10FFFF fits in 21 bits

export const MAX_CODE_POINT = 0x10ffff;

// Bounds of the sparse leaf domains
export const UINT32_MAX = 0xffffffff;
export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;
export const UINT64_MAX = 2n ** 64n - 1n;

/**
 * Shift of the root level of a dense trie covering `bits`-wide indices.
 * Chunks are taken from the most significant end so iteration is ascending.
 */
export function topShift(bits: number): number {
  return (Math.ceil(bits / BITS) - 1) * BITS;
}
