// src/core/resources/events/logs.ts
import { ARB_RETRYABLE_TX_ADDRESS, TOPIC_REDEEM_SCHEDULED } from '../../constants';
import type { Address } from '../../types/primitives';
import type { Log, TxReceipt } from '../../types/transactions';
import { isAddressEq } from '../../utils/addr';

type LogFilter = {
  /** Emitting contract; defaults to the retryable-ticket precompile. Pass `null` to accept any. */
  address?: Address | null;
};

// True when the log carries the RedeemScheduled signature and, unless disabled,
// was emitted by the expected contract.
export function isRedeemScheduledLog(log: Log, opts?: LogFilter): boolean {
  const topic = (log.topics[0] ?? '').toLowerCase();
  if (topic !== TOPIC_REDEEM_SCHEDULED) return false;

  const expected = opts?.address === undefined ? ARB_RETRYABLE_TX_ADDRESS : opts.address;
  if (expected === null) return true;
  return log.address !== undefined && isAddressEq(log.address, expected);
}

// Collects every RedeemScheduled log of a receipt, in log order.
export function findRedeemScheduledLogs(receipt: TxReceipt, opts?: LogFilter): Log[] {
  return receipt.logs.filter((lg) => isRedeemScheduledLog(lg, opts));
}
