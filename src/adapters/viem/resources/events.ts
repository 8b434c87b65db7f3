// src/adapters/viem/resources/events.ts
import {
  decodeAbiParameters,
  getAbiItem,
  parseAbiItem,
  toEventSelector,
  toEventSignature,
  type AbiEvent,
  type AbiParameter,
} from 'viem';
import type { Hex } from '../../../core/types/primitives';
import {
  bindEventDecoder,
  createEventSchemaParser,
  createRedeemScheduledDecoder,
  type AbiDecode,
  type AbiParam,
  type DecodedFields,
  type EventCodecDeps,
  type EventDecoder,
  type RedeemScheduledEvent,
  type ResolveEvents,
  type ResolvedEvent,
} from '../../../core/resources/events';

function toViemParam(p: AbiParam): AbiParameter {
  if (p.components) {
    return { name: p.name, type: p.type, components: p.components.map(toViemParam) };
  }
  return { name: p.name, type: p.type };
}

/** AbiDecode backed by viem's decodeAbiParameters. */
export const viemAbiDecode: AbiDecode = (params, data: Hex) => {
  const decoded: readonly unknown[] = decodeAbiParameters(params.map(toViemParam), data);
  return decoded;
};

function fromAbiParameter(p: AbiParameter): AbiParam {
  return {
    name: p.name,
    type: p.type,
    ...('components' in p ? { components: p.components.map(fromAbiParameter) } : {}),
  };
}

function toResolvedEvent(event: AbiEvent): ResolvedEvent {
  const signature = toEventSignature(event);
  // abitype rejects parameter types the ABI coder does not know
  const humanReadable: string = `event ${signature}`;
  parseAbiItem(humanReadable);
  return {
    name: event.name,
    signature,
    topic0: toEventSelector(event),
    anonymous: event.anonymous === true,
    inputs: event.inputs.map((p) => ({ ...fromAbiParameter(p), indexed: p.indexed === true })),
  };
}

/** Event lookup backed by viem's getAbiItem, one ABI entry at a time. */
export const viemResolveEvents: ResolveEvents = (abi, eventName) => {
  const events: ResolvedEvent[] = [];
  for (const entry of abi) {
    const single: readonly unknown[] = [entry];
    const item = getAbiItem({ abi: single, name: eventName });
    if (item?.type !== 'event') continue;
    events.push(toResolvedEvent(item));
  }
  return events;
};

const deps: EventCodecDeps = { resolveEvents: viemResolveEvents, abiDecode: viemAbiDecode };

/** Parses an event schema with viem doing fragment lookup and hashing. */
export const parseEventSchema = createEventSchemaParser(viemResolveEvents);

/**
 * Binds `eventName` from `abi` to the viem ABI decoder.
 * Schema problems throw a SCHEMA error; run this during startup.
 */
export function createEventDecoder<T>(
  abi: string | readonly unknown[],
  eventName: string,
  shape: (fields: DecodedFields) => T,
): EventDecoder<T> {
  return bindEventDecoder(parseEventSchema(abi, eventName), viemAbiDecode, shape);
}

/** RedeemScheduled decoder using viem. */
export function createRedeemScheduledParser(): EventDecoder<RedeemScheduledEvent> {
  return createRedeemScheduledDecoder(deps);
}
