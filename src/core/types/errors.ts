// src/core/types/errors.ts

import { formatEnvelopePretty } from '../errors/formatter';

const hasSymbolInspect = typeof Symbol === 'function' && typeof Symbol.for === 'function';
const kInspect: symbol | undefined = hasSymbolInspect
  ? Symbol.for('nodejs.util.inspect.custom')
  : undefined;

export type ErrorType =
  | 'VALIDATION'
  | 'SHORT_READ'
  | 'WRITE_FAILURE'
  | 'SIZE_EXCEEDED'
  | 'SCHEMA'
  | 'DECODE'
  | 'INTERNAL';

/** Resource surface */
export type Resource = 'codec' | 'aliasing' | 'events' | 'helpers';

/** Envelope we throw for every library-domain error. */
export interface ErrorEnvelope {
  /** Resource surface that raised the error. */
  resource: Resource;
  /** Library operation, e.g. 'codec.readByteString' */
  operation: string;
  /** Broad category */
  type: ErrorType;
  /** Human-readable, stable message for developers. */
  message: string;

  /** Optional detail (byte counts, field names, topic index) */
  context?: Record<string, unknown>;

  /** Original thrown error  */
  cause?: unknown;
}

/**
 * Error raised by every codec, aliasing and event-decoding operation.
 * The envelope keeps the category and operation so callers can branch on
 * `err.envelope.type` instead of parsing messages.
 */
export class BoundaryError extends Error {
  constructor(public readonly envelope: ErrorEnvelope) {
    super(formatEnvelopePretty(envelope), envelope.cause ? { cause: envelope.cause } : undefined);
    this.name = 'BoundaryError';
  }

  get type(): ErrorType {
    return this.envelope.type;
  }

  toJSON() {
    return { name: this.name, ...this.envelope };
  }
}

if (kInspect) {
  Object.defineProperty(BoundaryError.prototype, kInspect, {
    value(this: BoundaryError) {
      return `${this.name}: ${formatEnvelopePretty(this.envelope)}`;
    },
    enumerable: false,
  });
}

//  ---- Type guards ----
export function isBoundaryError(e: unknown): e is BoundaryError {
  if (!e || typeof e !== 'object') return false;
  if (!('envelope' in e)) return false;

  const envelope: unknown = e.envelope;
  if (!envelope || typeof envelope !== 'object') return false;
  return (
    'type' in envelope &&
    typeof envelope.type === 'string' &&
    'message' in envelope &&
    typeof envelope.message === 'string'
  );
}

// TryResult type for operations that can fail without throwing
export type TryResult<T> = { ok: true; value: T } | { ok: false; error: BoundaryError };

// Operation constants for codec error contexts
export const OP_CODEC = {
  readFull: 'codec.readFull',
  writeAll: 'codec.writeAll',
  readHash: 'codec.readHash',
  writeHash: 'codec.writeHash',
  readAddress: 'codec.readAddress',
  readAddressPadded256: 'codec.readAddressPadded256',
  writeAddress: 'codec.writeAddress',
  writeAddressPadded256: 'codec.writeAddressPadded256',
  readUint64: 'codec.readUint64',
  writeUint64: 'codec.writeUint64',
  readByteString: 'codec.readByteString',
  writeByteString: 'codec.writeByteString',
  words: {
    intToHash: 'codec.words:intToHash',
    uintToHash: 'codec.words:uintToHash',
    hashToBigint: 'codec.words:hashToBigint',
    hashPlusInt: 'codec.words:hashPlusInt',
    addressToHash: 'codec.words:addressToHash',
  },
} as const;

// Operation constants for aliasing error contexts
export const OP_ALIASING = {
  config: 'aliasing.createAliasConfig',
  apply: 'aliasing.applyL1ToL2Alias',
  undo: 'aliasing.undoL1ToL2Alias',
} as const;

// Operation constants for event decoding error contexts
export const OP_EVENTS = {
  parseSchema: 'events.parseEventSchema',
  decode: 'events.decode',
  tryDecode: 'events.tryDecode',
  data: 'events.decode:data',
  topics: 'events.decode:topics',
  shape: 'events.decode:shape',
  redeemScheduled: 'events.redeemScheduled:shape',
} as const;
