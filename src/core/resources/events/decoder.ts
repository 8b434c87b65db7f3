// src/core/resources/events/decoder.ts

import type { Hex } from '../../types/primitives';
import type { Log } from '../../types/transactions';
import { OP_EVENTS, type TryResult } from '../../types/errors';
import { createError } from '../../errors/factory';
import { createErrorHandlers } from '../../errors/error-ops';
import { isHash66 } from '../../utils/hash';
import { isHashedTopicType, type AbiParam, type EventSchema, type ResolveEvents } from './schema';

/**
 * ABI decoder injected by the adapter (ethers or viem).
 * Returns one value per parameter, in order.
 *
 * For ethers: AbiCoder.decode
 * For viem: decodeAbiParameters
 */
export type AbiDecode = (params: readonly AbiParam[], data: Hex) => readonly unknown[];

/** ABI library hooks an adapter supplies to build event decoders. */
export interface EventCodecDeps {
  resolveEvents: ResolveEvents;
  abiDecode: AbiDecode;
}

/** Decoded inputs keyed by field name. */
export type DecodedFields = Readonly<Record<string, unknown>>;

export interface EventDecoder<T> {
  readonly schema: EventSchema;
  /** True when topic 0 carries this event's signature hash. */
  matches(log: Pick<Log, 'topics'>): boolean;
  /** Decodes every field or throws a DECODE error; never returns a partial value. */
  decode(log: Log): T;
  tryDecode(log: Log): TryResult<T>;
}

const { wrapAs, toResult } = createErrorHandlers('events');

/**
 * Binds a parsed schema to an ABI decoder.
 *
 * Data fields are unpacked first, then topics 1..n are matched to the
 * indexed fields in declared order (topic 0 is the signature and is not
 * consumed). `shape` turns the field record into the caller's event type.
 */
export function bindEventDecoder<T>(
  schema: EventSchema,
  abiDecode: AbiDecode,
  shape: (fields: DecodedFields) => T,
): EventDecoder<T> {
  const ctx = { event: schema.signature };
  const topic0 = schema.topic0.toLowerCase();

  function unpackData(data: Hex, fields: Record<string, unknown>) {
    const values = wrapAs('DECODE', OP_EVENTS.data, () => abiDecode(schema.nonIndexed, data), {
      ctx,
      message: `Failed to unpack ${schema.name} data.`,
    });
    if (values.length !== schema.nonIndexed.length) {
      throw createError('DECODE', {
        resource: 'events',
        operation: OP_EVENTS.data,
        message: `Decoder returned ${values.length} values for ${schema.nonIndexed.length} fields.`,
        context: { ...ctx, expected: schema.nonIndexed.length, received: values.length },
      });
    }
    schema.nonIndexed.forEach((field, i) => {
      fields[field.name] = values[i];
    });
  }

  function parseTopics(topics: readonly Hex[], fields: Record<string, unknown>) {
    const expected = schema.indexed.length + 1;
    if (topics.length !== expected) {
      throw createError('DECODE', {
        resource: 'events',
        operation: OP_EVENTS.topics,
        message: `${schema.name} expects ${expected} topics, log has ${topics.length}.`,
        context: { ...ctx, expected, received: topics.length },
      });
    }
    schema.indexed.forEach((field, i) => {
      const topicIndex = i + 1;
      const topic = topics[topicIndex];
      if (!isHash66(topic)) {
        throw createError('DECODE', {
          resource: 'events',
          operation: OP_EVENTS.topics,
          message: `Topic ${topicIndex} is not a 32-byte word.`,
          context: { ...ctx, field: field.name, topicIndex },
        });
      }
      fields[field.name] = isHashedTopicType(field)
        ? topic.toLowerCase()
        : wrapAs('DECODE', OP_EVENTS.topics, () => abiDecode([field], topic)[0], {
            ctx: { ...ctx, field: field.name, topicIndex },
            message: `Topic ${topicIndex} is not a valid ${field.type}.`,
          });
    });
  }

  function decode(log: Log): T {
    const fields: Record<string, unknown> = {};
    unpackData(log.data, fields);
    parseTopics(log.topics, fields);
    const frozen = Object.freeze(fields);
    return wrapAs('DECODE', OP_EVENTS.shape, () => shape(frozen), {
      ctx,
      message: `Decoded ${schema.name} fields do not match the expected shape.`,
    });
  }

  return Object.freeze({
    schema,
    matches: (log: Pick<Log, 'topics'>) => (log.topics[0] ?? '').toLowerCase() === topic0,
    decode,
    tryDecode: (log: Log) => toResult(OP_EVENTS.tryDecode, () => decode(log), { ctx }),
  });
}
