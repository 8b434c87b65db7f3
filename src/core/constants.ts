// core/constants.ts

import type { Address, Hash, Hex } from './types/primitives';

import { keccak_256 } from '@noble/hashes/sha3';
import { utf8ToBytes, bytesToHex } from '@noble/hashes/utils';

/** Keccak-256 of a string, returned as lowercase 0x-prefixed hex. */
export const k256hex = (s: string): Hex => `0x${bytesToHex(keccak_256(utf8ToBytes(s)))}`;

// -----------------------------------------------------------------------------
// Wire widths (bytes)
// -----------------------------------------------------------------------------

export const HASH_LENGTH = 32;
export const ADDRESS_LENGTH = 20;
export const UINT64_LENGTH = 8;

/** Zero bytes in front of an address stored as a 32-byte word. */
export const ADDRESS_WORD_PADDING = HASH_LENGTH - ADDRESS_LENGTH;

export const ZERO_HASH: Hash = '0x0000000000000000000000000000000000000000000000000000000000000000';

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

// -----------------------------------------------------------------------------
// L1 → L2 address aliasing
// -----------------------------------------------------------------------------

/** Offset added to an L1 sender when its call crosses into L2. */
export const L1_TO_L2_ALIAS_OFFSET: Address = '0x1111000000000000000000000000000000001111';

/** Size of the 160-bit address ring. */
export const ADDRESS_SPACE = 1n << 160n;

/** Size of the 256-bit word ring. */
export const WORD_SPACE = 1n << 256n;

/**
 * L2 transaction type tags (EIP-2718 type byte) for the rollup-specific
 * transaction kinds.
 */
export const L2_TX_TYPE = {
  deposit: 0x64,
  unsigned: 0x65,
  contract: 0x66,
  retry: 0x68,
  submitRetryable: 0x69,
  internal: 0x6a,
  legacy: 0x78,
} as const;

export type L2TxType = (typeof L2_TX_TYPE)[keyof typeof L2_TX_TYPE];

// -----------------------------------------------------------------------------
// Precompiles & event topics
// -----------------------------------------------------------------------------

/** Retryable-ticket precompile on L2. */
export const ARB_RETRYABLE_TX_ADDRESS: Address = '0x000000000000000000000000000000000000006E';

/** topic0 for RedeemScheduled(bytes32,bytes32,uint64,uint64,address,uint256,uint256) */
export const TOPIC_REDEEM_SCHEDULED: Hex = k256hex(
  'RedeemScheduled(bytes32,bytes32,uint64,uint64,address,uint256,uint256)',
);

/** Prefix for non-fatal console diagnostics. */
export const LOG_PREFIX = '[rollup-boundary]';
