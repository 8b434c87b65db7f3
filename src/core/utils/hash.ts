import type { Hash, Hex } from '../types/primitives';

const RegExpHex = /^0x[0-9a-fA-F]*$/;

// `length` counts characters, including the '0x' prefix
export const isHash = (x: unknown, length?: number): boolean => {
  if (!x || typeof x !== 'string') return false;
  return (length === undefined || x.length === length) && RegExpHex.test(x);
};

// 0x-prefixed hex with a whole number of bytes ('0x' itself is the empty string)
export const isHexBytes = (x: unknown): x is Hex => isHash(x) && String(x).length % 2 === 0;

// Returns true if the string is a 0x-prefixed hex of length 66 (32 bytes + '0x')
export const isHash66 = (x: unknown): x is Hash => isHash(x, 66);
