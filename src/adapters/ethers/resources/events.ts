// src/adapters/ethers/resources/events.ts
import {
  AbiCoder,
  EventFragment,
  Fragment,
  ParamType,
  Result,
  type JsonFragmentType,
} from 'ethers';
import type { Hash, Hex } from '../../../core/types/primitives';
import { isHash66 } from '../../../core/utils/hash';
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

const coder = AbiCoder.defaultAbiCoder();

// ethers hands back tuples and arrays as Result proxies; flatten to plain arrays.
function plain(value: unknown): unknown {
  return value instanceof Result ? Array.from(value, plain) : value;
}

// ParamType.from rejects an `indexed` key outside event fragments, so drop it.
function toJsonParam(p: AbiParam): JsonFragmentType {
  return {
    name: p.name ?? '',
    type: p.type,
    ...(p.components ? { components: p.components.map(toJsonParam) } : {}),
  };
}

/** AbiDecode backed by ethers' AbiCoder. */
export const ethersAbiDecode: AbiDecode = (params, data: Hex) => {
  const decoded = coder.decode(
    params.map((p) => ParamType.from(toJsonParam(p))),
    data,
  );
  return params.map((_, i) => plain(decoded[i]));
};

// Tuple components live on the innermost child of an array type.
function tupleComponents(p: ParamType): readonly ParamType[] | null {
  if (p.components) return p.components;
  return p.arrayChildren ? tupleComponents(p.arrayChildren) : null;
}

function fromParamType(p: ParamType): AbiParam {
  const components = tupleComponents(p);
  return {
    name: p.name,
    type: p.type,
    indexed: p.indexed === true,
    ...(components ? { components: components.map(fromParamType) } : {}),
  };
}

function toHash(topicHash: string): Hash {
  if (!isHash66(topicHash)) throw new Error(`Unexpected topic hash: ${topicHash}`);
  return topicHash;
}

function toResolvedEvent(fragment: EventFragment): ResolvedEvent {
  return {
    name: fragment.name,
    signature: fragment.format('sighash'),
    topic0: toHash(fragment.topicHash),
    anonymous: fragment.anonymous,
    inputs: fragment.inputs.map(fromParamType),
  };
}

/**
 * Event lookup backed by ethers fragments. Every ABI entry goes through
 * Fragment.from, so an unknown parameter type fails here, at setup.
 */
export const ethersResolveEvents: ResolveEvents = (abi, eventName) =>
  abi
    .map((item) => Fragment.from(item))
    .filter((f): f is EventFragment => EventFragment.isFragment(f) && f.name === eventName)
    .map(toResolvedEvent);

const deps: EventCodecDeps = { resolveEvents: ethersResolveEvents, abiDecode: ethersAbiDecode };

/** Parses an event schema with ethers doing fragment parsing and hashing. */
export const parseEventSchema = createEventSchemaParser(ethersResolveEvents);

/**
 * Binds `eventName` from `abi` to the ethers ABI decoder.
 * Schema problems throw a SCHEMA error; run this during startup.
 */
export function createEventDecoder<T>(
  abi: string | readonly unknown[],
  eventName: string,
  shape: (fields: DecodedFields) => T,
): EventDecoder<T> {
  return bindEventDecoder(parseEventSchema(abi, eventName), ethersAbiDecode, shape);
}

/** RedeemScheduled decoder using ethers. */
export function createRedeemScheduledParser(): EventDecoder<RedeemScheduledEvent> {
  return createRedeemScheduledDecoder(deps);
}
