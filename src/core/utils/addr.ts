import type { Address } from '../types/primitives';
import { isHash } from './hash';

export function isAddress(x: unknown): x is Address {
  return isHash(x, 42); // 40 hex chars + '0x' prefix
}

// Compares two addresses for equality, ignoring case
export function isAddressEq(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
