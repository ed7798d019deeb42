/**
 * Bit helpers shared by the dense trie
 */

// Number of set bits in a 32-bit bitmap
export function popcount(x: number): number {
  x = x - ((x >>> 1) & 0x55555555);
  x = (x & 0x33333333) + ((x >>> 2) & 0x33333333);
  x = (x + (x >>> 4)) & 0x0f0f0f0f;
  return Math.imul(x, 0x01010101) >>> 24;
}

// Slots of a bitmap in ascending order
export function* bitSlots(bitmap: number): IterableIterator<number> {
  let rest = bitmap;
  while (rest !== 0) {
    const low = rest & -rest;
    yield 31 - Math.clz32(low);
    rest ^= low;
  }
}
