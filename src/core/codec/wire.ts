// src/core/codec/wire.ts

import type { Address, Hash, Hex } from '../types/primitives';
import { OP_CODEC } from '../types/errors';
import { createError } from '../errors/factory';
import {
  ADDRESS_LENGTH,
  ADDRESS_WORD_PADDING,
  HASH_LENGTH,
  LOG_PREFIX,
  UINT64_LENGTH,
} from '../constants';
import { isAddress } from '../utils/addr';
import { isHash66, isHexBytes } from '../utils/hash';
import { isBigint, isNumber, isUint64 } from '../utils/number';
import { bigintToFixedBytes, bytesToBigint, fromHex, isAllZero, toHex } from '../utils/bytes';
import { readFull, writeAll, type ByteSink, type ByteSource } from './stream';

/*
 * Wire layout (big-endian, byte-aligned):
 *
 *   hash               32 bytes
 *   address            20 bytes
 *   address (padded)   32 bytes   12 zero bytes + 20 address bytes
 *   uint64              8 bytes
 *   byte string     8 + n bytes   uint64 length prefix, then n raw bytes
 */

function invalid(operation: string, message: string, context?: Record<string, unknown>) {
  return createError('VALIDATION', { resource: 'codec', operation, message, context });
}

function hashBytes(hash: Hash, operation: string): Uint8Array {
  if (!isHash66(hash)) {
    throw invalid(operation, 'Expected a 0x-prefixed 32-byte hash.', { value: hash });
  }
  return fromHex(hash);
}

function addressBytes(address: Address, operation: string): Uint8Array {
  if (!isAddress(address)) {
    throw invalid(operation, 'Expected a 0x-prefixed 20-byte address.', { value: address });
  }
  return fromHex(address);
}

// ---------------------------------------------------------------------------
// Hashes
// ---------------------------------------------------------------------------

export function readHash(source: ByteSource): Hash {
  return toHex(readFull(source, HASH_LENGTH, OP_CODEC.readHash));
}

export function writeHash(hash: Hash, sink: ByteSink): void {
  writeAll(sink, hashBytes(hash, OP_CODEC.writeHash), OP_CODEC.writeHash);
}

// ---------------------------------------------------------------------------
// Addresses
// ---------------------------------------------------------------------------

export function readAddress(source: ByteSource): Address {
  return toHex(readFull(source, ADDRESS_LENGTH, OP_CODEC.readAddress));
}

/**
 * Reads a 32-byte word and keeps its low 20 bytes.
 *
 * The 12 high bytes are not validated: producers must write zeros, but a
 * non-zero prefix is only reported, never rejected.
 */
export function readAddressPadded256(source: ByteSource): Address {
  const word = readFull(source, HASH_LENGTH, OP_CODEC.readAddressPadded256);
  const padding = word.subarray(0, ADDRESS_WORD_PADDING);
  if (!isAllZero(padding)) {
    // eslint-disable-next-line no-console
    console.debug(`${LOG_PREFIX} non-fatal warning: non-zero address padding`, toHex(padding));
  }
  return toHex(word.subarray(ADDRESS_WORD_PADDING));
}

export function writeAddress(address: Address, sink: ByteSink): void {
  writeAll(sink, addressBytes(address, OP_CODEC.writeAddress), OP_CODEC.writeAddress);
}

export function writeAddressPadded256(address: Address, sink: ByteSink): void {
  const bytes = addressBytes(address, OP_CODEC.writeAddressPadded256);
  writeAll(sink, new Uint8Array(ADDRESS_WORD_PADDING), OP_CODEC.writeAddressPadded256);
  writeAll(sink, bytes, OP_CODEC.writeAddressPadded256);
}

// ---------------------------------------------------------------------------
// Integers
// ---------------------------------------------------------------------------

function readUint64As(source: ByteSource, operation: string): bigint {
  return bytesToBigint(readFull(source, UINT64_LENGTH, operation));
}

function uint64Bytes(value: bigint, operation: string): Uint8Array {
  if (!isUint64(value)) {
    throw invalid(operation, 'Value does not fit in an unsigned 64-bit integer.', {
      value: String(value),
    });
  }
  return bigintToFixedBytes(value, UINT64_LENGTH);
}

export function readUint64(source: ByteSource): bigint {
  return readUint64As(source, OP_CODEC.readUint64);
}

export function writeUint64(value: bigint, sink: ByteSink): void {
  writeAll(sink, uint64Bytes(value, OP_CODEC.writeUint64), OP_CODEC.writeUint64);
}

// ---------------------------------------------------------------------------
// Byte strings
// ---------------------------------------------------------------------------

function byteLimit(max: number | bigint): bigint {
  if (isBigint(max) && max >= 0n) return max;
  if (isNumber(max) && max >= 0) return BigInt(Math.floor(max));
  throw invalid(OP_CODEC.readByteString, 'maxBytesToRead must be a finite, non-negative size.', {
    max: String(max),
  });
}

const MAX_SAFE_LENGTH = BigInt(Number.MAX_SAFE_INTEGER);

function sizeExceeded(size: bigint, max: bigint, message: string) {
  return createError('SIZE_EXCEEDED', {
    resource: 'codec',
    operation: OP_CODEC.readByteString,
    message,
    context: { size: size.toString(), max: max.toString() },
  });
}

/**
 * Reads a uint64 length prefix followed by that many bytes.
 *
 * `maxBytesToRead` bounds the allocation: a larger declared length fails
 * with SIZE_EXCEEDED before any byte past the prefix is read.
 */
export function readByteString(source: ByteSource, maxBytesToRead: number | bigint): Uint8Array {
  const max = byteLimit(maxBytesToRead);
  const size = readUint64As(source, OP_CODEC.readByteString);
  if (size > max) {
    throw sizeExceeded(size, max, `Declared byte string length ${size} exceeds the limit of ${max}.`);
  }
  if (size > MAX_SAFE_LENGTH) {
    throw sizeExceeded(
      size,
      MAX_SAFE_LENGTH,
      `Declared byte string length ${size} exceeds the largest readable length.`,
    );
  }
  return readFull(source, Number(size), OP_CODEC.readByteString);
}

function rawBytes(bytes: Uint8Array | Hex): Uint8Array {
  if (typeof bytes !== 'string') return bytes;
  if (!isHexBytes(bytes)) {
    throw invalid(OP_CODEC.writeByteString, 'Expected raw bytes or 0x-prefixed hex.', {
      value: bytes,
    });
  }
  return fromHex(bytes);
}

export function writeByteString(bytes: Uint8Array | Hex, sink: ByteSink): void {
  const raw = rawBytes(bytes);
  const prefix = uint64Bytes(BigInt(raw.length), OP_CODEC.writeByteString);
  writeAll(sink, prefix, OP_CODEC.writeByteString);
  writeAll(sink, raw, OP_CODEC.writeByteString);
}
