// src/core/resources/aliasing/config.ts

import type { Address } from '../../types/primitives';
import { OP_ALIASING } from '../../types/errors';
import { createError } from '../../errors/factory';
import { ADDRESS_SPACE, L1_TO_L2_ALIAS_OFFSET } from '../../constants';
import { isAddress } from '../../utils/addr';

/** Offsets used by the forward and inverse alias transforms. */
export interface AliasConfig {
  /** Added to an L1 address to obtain its L2 alias. */
  readonly offset: bigint;
  /** `2^160 - offset`; added to an alias to recover the L1 address. */
  readonly inverseOffset: bigint;
}

/**
 * Builds the immutable aliasing configuration.
 * Build it once during setup and share it; the returned object is frozen.
 */
export function createAliasConfig(offset: Address | bigint = L1_TO_L2_ALIAS_OFFSET): AliasConfig {
  if (typeof offset === 'string' && !isAddress(offset)) {
    throw createError('VALIDATION', {
      resource: 'aliasing',
      operation: OP_ALIASING.config,
      message: 'Alias offset must be a 0x-prefixed 20-byte value.',
      context: { offset },
    });
  }
  const value = typeof offset === 'string' ? BigInt(offset) : offset;
  if (value <= 0n || value >= ADDRESS_SPACE) {
    throw createError('VALIDATION', {
      resource: 'aliasing',
      operation: OP_ALIASING.config,
      message: 'Alias offset must lie strictly between 0 and 2^160.',
      context: { offset: value.toString(16) },
    });
  }
  return Object.freeze({ offset: value, inverseOffset: ADDRESS_SPACE - value });
}

/** Default configuration, built once at module load. */
export const DEFAULT_ALIAS_CONFIG: AliasConfig = createAliasConfig();
