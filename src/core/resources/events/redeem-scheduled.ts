// src/core/resources/events/redeem-scheduled.ts

import type { Address, Hash } from '../../types/primitives';
import { OP_EVENTS } from '../../types/errors';
import { createError } from '../../errors/factory';
import { ArbRetryableTxABI } from '../../abi';
import { isAddress } from '../../utils/addr';
import { isHash66 } from '../../utils/hash';
import { isBigint, isNumber } from '../../utils/number';
import {
  bindEventDecoder,
  type DecodedFields,
  type EventCodecDeps,
  type EventDecoder,
} from './decoder';
import { createEventSchemaParser, type EventSchema, type ResolveEvents } from './schema';

/** A retry of a retryable ticket was scheduled for the next block. */
export interface RedeemScheduledEvent {
  ticketId: Hash;
  retryTxHash: Hash;
  sequenceNum: bigint;
  donatedGas: bigint;
  gasDonor: Address;
  maxRefund: bigint;
  submissionFeeRefund: bigint;
}

function fieldError(field: string, expected: string) {
  return createError('DECODE', {
    resource: 'events',
    operation: OP_EVENTS.redeemScheduled,
    message: `RedeemScheduled.${field} is not ${expected}.`,
    context: { event: 'RedeemScheduled', field },
  });
}

function hashField(fields: DecodedFields, key: keyof RedeemScheduledEvent): Hash {
  const v = fields[key];
  if (!isHash66(v)) throw fieldError(key, 'a bytes32');
  return `0x${v.slice(2).toLowerCase()}`;
}

function uintField(fields: DecodedFields, key: keyof RedeemScheduledEvent): bigint {
  const v = fields[key];
  if (isBigint(v) && v >= 0n) return v;
  if (isNumber(v) && Number.isSafeInteger(v) && v >= 0) return BigInt(v);
  throw fieldError(key, 'an unsigned integer');
}

function addressField(fields: DecodedFields, key: keyof RedeemScheduledEvent): Address {
  const v = fields[key];
  if (!isAddress(v)) throw fieldError(key, 'an address');
  return `0x${v.slice(2).toLowerCase()}`;
}

/** Shapes a decoded field record into a {@link RedeemScheduledEvent}. */
export function toRedeemScheduledEvent(fields: DecodedFields): RedeemScheduledEvent {
  return {
    ticketId: hashField(fields, 'ticketId'),
    retryTxHash: hashField(fields, 'retryTxHash'),
    sequenceNum: uintField(fields, 'sequenceNum'),
    donatedGas: uintField(fields, 'donatedGas'),
    gasDonor: addressField(fields, 'gasDonor'),
    maxRefund: uintField(fields, 'maxRefund'),
    submissionFeeRefund: uintField(fields, 'submissionFeeRefund'),
  };
}

/** Schema of ArbRetryableTx.RedeemScheduled, parsed from the bundled ABI. */
export function redeemScheduledSchema(resolveEvents: ResolveEvents): EventSchema {
  return createEventSchemaParser(resolveEvents)(ArbRetryableTxABI, 'RedeemScheduled');
}

/**
 * Builds the RedeemScheduled decoder on top of an adapter's ABI hooks.
 * Meant to run once during setup; the result is immutable and can be shared.
 */
export function createRedeemScheduledDecoder(
  deps: EventCodecDeps,
): EventDecoder<RedeemScheduledEvent> {
  return bindEventDecoder(
    redeemScheduledSchema(deps.resolveEvents),
    deps.abiDecode,
    toRedeemScheduledEvent,
  );
}
