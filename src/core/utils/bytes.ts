// src/core/utils/bytes.ts
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import type { Hex } from '../types/primitives';

/** 0x-prefixed, lowercase hex of raw bytes. */
export const toHex = (bytes: Uint8Array): Hex => `0x${bytesToHex(bytes)}`;

/** Raw bytes of a 0x-prefixed hex string. Odd-length bodies are rejected. */
export const fromHex = (hex: Hex): Uint8Array => hexToBytes(hex.slice(2));

/**
 * Minimal big-endian bytes of a non-negative integer: zero encodes to an empty
 * array, and there are never leading zero bytes.
 */
export function bigintToBytes(value: bigint): Uint8Array {
  if (value < 0n) throw new RangeError('bigintToBytes expects a non-negative value');
  if (value === 0n) return new Uint8Array(0);
  const hex = value.toString(16);
  return hexToBytes(hex.length % 2 ? `0${hex}` : hex);
}

/** Unsigned big-endian interpretation of raw bytes. */
export function bytesToBigint(bytes: Uint8Array): bigint {
  return bytes.length === 0 ? 0n : BigInt(`0x${bytesToHex(bytes)}`);
}

/** Left-pads to `size` bytes. Longer inputs are rejected, never truncated. */
export function padLeft(bytes: Uint8Array, size: number): Uint8Array {
  if (bytes.length > size) throw new RangeError(`padLeft: ${bytes.length} bytes exceed ${size}`);
  if (bytes.length === size) return bytes;
  const out = new Uint8Array(size);
  out.set(bytes, size - bytes.length);
  return out;
}

/** Big-endian, fixed-width encoding of an unsigned integer. */
export function bigintToFixedBytes(value: bigint, size: number): Uint8Array {
  return padLeft(bigintToBytes(value), size);
}

export function isAllZero(bytes: Uint8Array): boolean {
  return bytes.every((b) => b === 0);
}
