// src/core/resources/aliasing/tx-types.ts

import { L2_TX_TYPE } from '../../constants';

// Transaction kinds whose `from` is an aliased L1 address.
const ALIASED_TX_TYPES: ReadonlySet<number> = new Set([
  L2_TX_TYPE.unsigned,
  L2_TX_TYPE.contract,
  L2_TX_TYPE.retry,
]);

/** True when a transaction of this type carries an aliased sender. */
export function doesTxTypeAlias(txType: number): boolean {
  return ALIASED_TX_TYPES.has(txType);
}
