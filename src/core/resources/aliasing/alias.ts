// src/core/resources/aliasing/alias.ts

import type { Address } from '../../types/primitives';
import { OP_ALIASING } from '../../types/errors';
import { createError } from '../../errors/factory';
import { ADDRESS_LENGTH } from '../../constants';
import { isAddress } from '../../utils/addr';
import { bigintToBytes, bytesToBigint, fromHex, padLeft, toHex } from '../../utils/bytes';
import { DEFAULT_ALIAS_CONFIG, type AliasConfig } from './config';

// (address + offset) over unbounded integers, then the sum's minimal
// big-endian bytes cut down to the trailing 20 and left-padded back to 20.
function shift(address: Address, offset: bigint, operation: string): Address {
  if (!isAddress(address)) {
    throw createError('VALIDATION', {
      resource: 'aliasing',
      operation,
      message: 'Expected a 0x-prefixed 20-byte address.',
      context: { address },
    });
  }
  let sum = bigintToBytes(bytesToBigint(fromHex(address)) + offset);
  if (sum.length > ADDRESS_LENGTH) sum = sum.subarray(sum.length - ADDRESS_LENGTH);
  return toHex(padLeft(sum, ADDRESS_LENGTH));
}

/**
 * Maps an L1 address to the address it acts as on L2:
 * `(address + offset) mod 2^160`.
 *
 * @example
 * applyL1ToL2Alias('0x0000000000000000000000000000000000000000');
 * // '0x1111000000000000000000000000000000001111'
 */
export function applyL1ToL2Alias(
  address: Address,
  config: AliasConfig = DEFAULT_ALIAS_CONFIG,
): Address {
  return shift(address, config.offset, OP_ALIASING.apply);
}

/** Inverse of {@link applyL1ToL2Alias}. */
export function undoL1ToL2Alias(
  alias: Address,
  config: AliasConfig = DEFAULT_ALIAS_CONFIG,
): Address {
  return shift(alias, config.inverseOffset, OP_ALIASING.undo);
}
