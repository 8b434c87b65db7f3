import type { ResolveEvents, ResolvedEvent } from '../schema';
import { TOPIC_REDEEM_SCHEDULED, k256hex } from '../../../constants';

// Lookup that ignores the ABI and serves fixed events by name.
export function resolveFrom(events: readonly ResolvedEvent[]): ResolveEvents {
  return (_abi, eventName) => events.filter((e) => e.name === eventName);
}

export const DEPOSIT_EVENT: ResolvedEvent = {
  name: 'Deposit',
  signature: 'Deposit(address,uint256)',
  topic0: k256hex('Deposit(address,uint256)'),
  anonymous: false,
  inputs: [
    { name: 'account', type: 'address', indexed: true },
    { name: 'amount', type: 'uint256', indexed: false },
  ],
};

export const REDEEM_SCHEDULED_EVENT: ResolvedEvent = {
  name: 'RedeemScheduled',
  signature: 'RedeemScheduled(bytes32,bytes32,uint64,uint64,address,uint256,uint256)',
  topic0: TOPIC_REDEEM_SCHEDULED,
  anonymous: false,
  inputs: [
    { name: 'ticketId', type: 'bytes32', indexed: true },
    { name: 'retryTxHash', type: 'bytes32', indexed: true },
    { name: 'sequenceNum', type: 'uint64', indexed: true },
    { name: 'donatedGas', type: 'uint64', indexed: false },
    { name: 'gasDonor', type: 'address', indexed: false },
    { name: 'maxRefund', type: 'uint256', indexed: false },
    { name: 'submissionFeeRefund', type: 'uint256', indexed: false },
  ],
};
