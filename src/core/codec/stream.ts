// src/core/codec/stream.ts

import type { Hex } from '../types/primitives';
import { OP_CODEC } from '../types/errors';
import { createError } from '../errors/factory';
import { toBoundaryError } from '../errors/error-ops';
import { fromHex, toHex } from '../utils/bytes';

/**
 * Readable side of a byte transport.
 *
 * `read(max)` returns between 1 and `max` bytes, or an empty array once the
 * source is exhausted. Returning fewer bytes than asked is allowed; callers
 * that need an exact count go through {@link readFull}.
 */
export interface ByteSource {
  read(max: number): Uint8Array;
}

/**
 * Writable side of a byte transport. `write` throws when the transport
 * rejects the chunk (closed pipe, full buffer, ...).
 */
export interface ByteSink {
  write(chunk: Uint8Array): void;
}

// Upper bound for a single `read` call; the result grows only with bytes actually received.
const READ_CHUNK = 64 * 1024;

/** Reads exactly `n` bytes or fails with SHORT_READ. */
export function readFull(source: ByteSource, n: number, operation: string = OP_CODEC.readFull) {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw createError('VALIDATION', {
      resource: 'codec',
      operation,
      message: 'Byte count must be a non-negative safe integer.',
      context: { expected: String(n) },
    });
  }
  const chunks: Uint8Array[] = [];
  let received = 0;
  while (received < n) {
    const want = Math.min(n - received, READ_CHUNK);
    const chunk = source.read(want);
    if (chunk.length === 0) break;
    // a misbehaving source may hand back more than asked; never read past n
    const take = Math.min(chunk.length, want);
    chunks.push(chunk.slice(0, take));
    received += take;
  }
  if (received < n) {
    throw createError('SHORT_READ', {
      resource: 'codec',
      operation,
      message: `Stream ended after ${received} of ${n} bytes.`,
      context: { expected: n, received },
    });
  }
  if (chunks.length === 1) return chunks[0];
  const out = new Uint8Array(n);
  let off = 0;
  for (const c of chunks) {
    out.set(c, off);
    off += c.length;
  }
  return out;
}

/** Forwards `bytes` to the sink; any sink failure surfaces as WRITE_FAILURE. */
export function writeAll(
  sink: ByteSink,
  bytes: Uint8Array,
  operation: string = OP_CODEC.writeAll,
): void {
  try {
    sink.write(bytes);
  } catch (e) {
    throw toBoundaryError(
      'WRITE_FAILURE',
      {
        resource: 'codec',
        operation,
        message: `Stream rejected a ${bytes.length}-byte write.`,
        context: { size: bytes.length },
      },
      e,
    );
  }
}

// ---------------------------------------------------------------------------
// In-memory transports
// ---------------------------------------------------------------------------

/** ByteSource over a fixed buffer. */
export class BytesReader implements ByteSource {
  private readonly buf: Uint8Array;
  private pos = 0;

  constructor(input: Uint8Array | Hex) {
    this.buf = typeof input === 'string' ? fromHex(input) : input;
  }

  read(max: number): Uint8Array {
    const end = Math.min(this.buf.length, this.pos + Math.max(0, max));
    const chunk = this.buf.slice(this.pos, end);
    this.pos = end;
    return chunk;
  }

  /** Bytes consumed so far. */
  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.buf.length - this.pos;
  }
}

/** ByteSink collecting everything written into one buffer. */
export class BytesWriter implements ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private size = 0;

  write(chunk: Uint8Array): void {
    // copy: callers may reuse their buffer after the call
    this.chunks.push(chunk.slice());
    this.size += chunk.length;
  }

  get length(): number {
    return this.size;
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.size);
    let off = 0;
    for (const c of this.chunks) {
      out.set(c, off);
      off += c.length;
    }
    return out;
  }

  toHex(): Hex {
    return toHex(this.toBytes());
  }
}
