// src/core/codec/words.ts

import type { Address, Hash } from '../types/primitives';
import { OP_CODEC } from '../types/errors';
import { createError } from '../errors/factory';
import { ADDRESS_WORD_PADDING, HASH_LENGTH, WORD_SPACE } from '../constants';
import { isAddress } from '../utils/addr';
import { isHash66 } from '../utils/hash';
import { isBigint, isNumber, MAX_UINT256 } from '../utils/number';
import { bigintToFixedBytes, bytesToBigint, fromHex, toHex } from '../utils/bytes';

/*
 * Helpers treating a 32-byte hash as a 256-bit chain word.
 *
 * Signed values are stored in two's complement, the same representation the
 * EVM uses for int256, so `intToHash(-1n)` is the all-ones word. Arithmetic
 * wraps modulo 2^256.
 */

function invalid(operation: string, message: string, context?: Record<string, unknown>) {
  return createError('VALIDATION', { resource: 'codec', operation, message, context });
}

function toInteger(value: bigint | number, operation: string): bigint {
  if (isBigint(value)) return value;
  if (isNumber(value) && Number.isSafeInteger(value)) return BigInt(value);
  throw invalid(operation, 'Expected a bigint or a safe integer.', { value: String(value) });
}

const wrapWord = (value: bigint): bigint => ((value % WORD_SPACE) + WORD_SPACE) % WORD_SPACE;

const wordToHash = (word: bigint): Hash => toHex(bigintToFixedBytes(word, HASH_LENGTH));

/** Unsigned big-endian interpretation of a 32-byte hash. */
export function hashToBigint(hash: Hash): bigint {
  if (!isHash66(hash)) {
    throw invalid(OP_CODEC.words.hashToBigint, 'Expected a 0x-prefixed 32-byte hash.', {
      value: hash,
    });
  }
  return bytesToBigint(fromHex(hash));
}

/** Signed integer as a 32-byte word (two's complement). Must fit in int256. */
export function intToHash(value: bigint | number): Hash {
  const v = toInteger(value, OP_CODEC.words.intToHash);
  const bound = 1n << 255n;
  if (v < -bound || v >= bound) {
    throw invalid(OP_CODEC.words.intToHash, 'Value does not fit in a signed 256-bit word.', {
      value: v.toString(),
    });
  }
  return wordToHash(wrapWord(v));
}

/** Unsigned integer as a 32-byte word. */
export function uintToHash(value: bigint | number): Hash {
  const v = toInteger(value, OP_CODEC.words.uintToHash);
  if (v < 0n || v > MAX_UINT256) {
    throw invalid(OP_CODEC.words.uintToHash, 'Value does not fit in an unsigned 256-bit word.', {
      value: v.toString(),
    });
  }
  return wordToHash(v);
}

/**
 * `hash + delta`, with the hash read as an unsigned word and the result
 * reduced modulo 2^256. A result below zero wraps to the top of the range
 * (`hashPlusInt(ZERO_HASH, -1)` is the all-ones word).
 */
export function hashPlusInt(hash: Hash, delta: bigint | number): Hash {
  const d = toInteger(delta, OP_CODEC.words.hashPlusInt);
  return wordToHash(wrapWord(hashToBigint(hash) + d));
}

/** Address right-aligned in a 32-byte word. */
export function addressToHash(address: Address): Hash {
  if (!isAddress(address)) {
    throw invalid(OP_CODEC.words.addressToHash, 'Expected a 0x-prefixed 20-byte address.', {
      value: address,
    });
  }
  return `0x${'00'.repeat(ADDRESS_WORD_PADDING)}${address.slice(2).toLowerCase()}`;
}
