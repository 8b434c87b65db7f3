// src/core/resources/events/schema.ts

import type { Hash } from '../../types/primitives';
import { OP_EVENTS } from '../../types/errors';
import { createError } from '../../errors/factory';
import { createErrorHandlers } from '../../errors/error-ops';

/** One ABI parameter, as found in a contract's JSON ABI. */
export interface AbiParam {
  readonly name?: string;
  readonly type: string;
  readonly indexed?: boolean;
  readonly internalType?: string;
  readonly components?: readonly AbiParam[];
}

/** Event input after validation: every field carries a name. */
export interface EventField extends AbiParam {
  readonly name: string;
  readonly indexed: boolean;
}

export interface EventSchema {
  readonly name: string;
  /** Canonical signature, e.g. `Transfer(address,address,uint256)`. */
  readonly signature: string;
  /** keccak256(signature): the value expected in topic 0. */
  readonly topic0: Hash;
  /** All inputs in declared order. */
  readonly inputs: readonly EventField[];
  /** Inputs carried in topics 1..n, in declared order. */
  readonly indexed: readonly EventField[];
  /** Inputs carried in the data payload, in declared order. */
  readonly nonIndexed: readonly EventField[];
}

/** Event fragment as parsed by the adapter's ABI library. */
export interface ResolvedEvent {
  readonly name: string;
  readonly signature: string;
  readonly topic0: Hash;
  readonly anonymous: boolean;
  readonly inputs: readonly AbiParam[];
}

/**
 * Fragment lookup injected by the adapter (ethers or viem).
 * Returns every event named `eventName`, and throws when the library
 * cannot parse a fragment it has to look at.
 *
 * For ethers: Fragment.from + EventFragment.topicHash
 * For viem: getAbiItem + toEventSelector
 */
export type ResolveEvents = (
  abi: readonly unknown[],
  eventName: string,
) => readonly ResolvedEvent[];

export type EventSchemaParser = (abi: string | readonly unknown[], eventName: string) => EventSchema;

const { wrapAs } = createErrorHandlers('events');

function schemaError(message: string, context?: Record<string, unknown>, cause?: unknown) {
  return createError('SCHEMA', {
    resource: 'events',
    operation: OP_EVENTS.parseSchema,
    message,
    context,
    ...(cause === undefined ? {} : { cause }),
  });
}

/**
 * Indexed reference types (string, bytes, arrays, tuples) are stored in a
 * topic as the keccak256 of their encoding, which cannot be decoded back.
 */
export function isHashedTopicType(param: AbiParam): boolean {
  return (
    param.type === 'string' ||
    param.type === 'bytes' ||
    param.type.endsWith(']') ||
    param.type.startsWith('tuple')
  );
}

function parseAbiJson(abi: string): unknown {
  try {
    return JSON.parse(abi);
  } catch (e) {
    throw schemaError('ABI is not valid JSON.', undefined, e);
  }
}

function toFields(event: ResolvedEvent): EventField[] {
  const seen = new Set<string>();
  return event.inputs.map((param, i): EventField => {
    if (!param.name) {
      throw schemaError(`Input ${i} of '${event.name}' has no name.`, {
        event: event.name,
        field: i,
      });
    }
    if (seen.has(param.name)) {
      throw schemaError(`Input '${param.name}' of '${event.name}' is declared twice.`, {
        event: event.name,
        field: param.name,
      });
    }
    seen.add(param.name);
    return Object.freeze({ ...param, name: param.name, indexed: param.indexed === true });
  });
}

/**
 * Builds `parseEventSchema` on top of an adapter's fragment lookup.
 *
 * The returned parser accepts an ABI as JSON text or a parsed array, resolves
 * `eventName` and splits its inputs into indexed and non-indexed fields,
 * keeping declared order. Any problem is a SCHEMA error; callers build
 * schemas during startup and should treat that failure as fatal.
 */
export function createEventSchemaParser(resolveEvents: ResolveEvents): EventSchemaParser {
  return function parseEventSchema(abi, eventName) {
    const items = typeof abi === 'string' ? parseAbiJson(abi) : abi;
    if (!Array.isArray(items)) throw schemaError('ABI must be an array of fragments.');

    const matches = wrapAs('SCHEMA', OP_EVENTS.parseSchema, () => resolveEvents(items, eventName), {
      ctx: { event: eventName },
      message: `ABI fragment for '${eventName}' could not be parsed.`,
    });
    const event = matches[0];
    if (!event) {
      throw schemaError(`Event '${eventName}' not found in ABI.`, { event: eventName });
    }
    if (matches.length > 1) {
      throw schemaError(`Event '${eventName}' is overloaded; pass an ABI with a single variant.`, {
        event: eventName,
      });
    }
    if (event.anonymous) {
      throw schemaError(`Event '${eventName}' is anonymous and has no signature topic.`, {
        event: eventName,
      });
    }

    const inputs = toFields(event);
    return Object.freeze({
      name: event.name,
      signature: event.signature,
      topic0: event.topic0,
      inputs: Object.freeze(inputs),
      indexed: Object.freeze(inputs.filter((f) => f.indexed)),
      nonIndexed: Object.freeze(inputs.filter((f) => !f.indexed)),
    });
  };
}
