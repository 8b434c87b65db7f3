// src/core/types/transactions.ts
import type { Address, Hex } from './primitives';

// Raw log record as handed over by a chain-log source.
export type Log = {
  address?: Address;
  topics: readonly Hex[];
  data: Hex;
  transactionHash?: Hex;
};

// Generic transaction receipt type containing logs.
export type TxReceipt = {
  logs: readonly Log[];
};
