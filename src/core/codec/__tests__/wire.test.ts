import { describe, it, expect, vi, afterEach } from 'vitest';
import { BytesReader, BytesWriter, type ByteSink } from '../stream';
import {
  readAddress,
  readAddressPadded256,
  readByteString,
  readHash,
  readUint64,
  writeAddress,
  writeAddressPadded256,
  writeByteString,
  writeHash,
  writeUint64,
} from '../wire';
import { isBoundaryError, type ErrorType } from '../../types/errors';
import type { Address, Hash, Hex } from '../../types/primitives';
import { MAX_UINT64 } from '../../utils/number';

const HASH: Hash = '0x5f2a7c0e4b1d93a8e6f0c2b4d6e8fa1c3e5a7b9d0f2e4c6a8b0d2f4e6a8c0e21';
const ADDR: Address = '0x36615cf349d7f6344891b1e7ca7c72883f5dc049';

function encode(fn: (sink: ByteSink) => void): Hex {
  const w = new BytesWriter();
  fn(w);
  return w.toHex();
}

function expectError(fn: () => unknown, type: ErrorType) {
  try {
    fn();
  } catch (e) {
    if (!isBoundaryError(e)) throw e;
    expect(e.type).toBe(type);
    return e;
  }
  throw new Error(`expected a ${type} error`);
}

// Drops the last byte of an encoding.
const truncated = (hex: Hex) => new BytesReader(`0x${hex.slice(2, -2)}`);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('codec/wire hashes', () => {
  it('writes the 32 raw bytes and reads them back', () => {
    const hex = encode((s) => writeHash(HASH, s));
    expect(hex).toBe(HASH);
    expect(readHash(new BytesReader(hex))).toBe(HASH);
  });

  it('normalizes case on read', () => {
    const upper: Hash = `0x${HASH.slice(2).toUpperCase()}`;
    expect(readHash(new BytesReader(encode((s) => writeHash(upper, s))))).toBe(HASH);
  });

  it('rejects values that are not 32 bytes', () => {
    expectError(() => writeHash('0x1234', new BytesWriter()), 'VALIDATION');
  });

  it('fails on a short stream', () => {
    expectError(() => readHash(truncated(HASH)), 'SHORT_READ');
  });
});

describe('codec/wire addresses', () => {
  it('round-trips 20-byte addresses', () => {
    const hex = encode((s) => writeAddress(ADDR, s));
    expect(hex).toBe(ADDR);
    expect(readAddress(new BytesReader(hex))).toBe(ADDR);
  });

  it('returns lowercase for checksummed input', () => {
    const checksummed: Address = '0x36615Cf349d7F6344891B1e7CA7C72883F5dc049';
    expect(readAddress(new BytesReader(encode((s) => writeAddress(checksummed, s))))).toBe(ADDR);
  });

  it('writes padded addresses as a right-aligned 32-byte word', () => {
    const hex = encode((s) => writeAddressPadded256(ADDR, s));
    expect(hex).toBe(`0x${'00'.repeat(12)}${ADDR.slice(2)}`);
    expect(readAddressPadded256(new BytesReader(hex))).toBe(ADDR);
  });

  it('padded read keeps the low 20 bytes even when the padding is dirty', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const dirty: Hex = `0x${'ff'.repeat(12)}${ADDR.slice(2)}`;
    expect(readAddressPadded256(new BytesReader(dirty))).toBe(ADDR);
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it('padded read stays silent for clean padding', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    readAddressPadded256(new BytesReader(encode((s) => writeAddressPadded256(ADDR, s))));
    expect(debug).not.toHaveBeenCalled();
  });

  it('rejects malformed addresses on write', () => {
    expectError(() => writeAddress('0xdeadbeef', new BytesWriter()), 'VALIDATION');
    expectError(() => writeAddressPadded256(HASH, new BytesWriter()), 'VALIDATION');
  });

  it('fails on short streams', () => {
    expectError(() => readAddress(truncated(ADDR)), 'SHORT_READ');
    const padded = encode((s) => writeAddressPadded256(ADDR, s));
    expectError(() => readAddressPadded256(truncated(padded)), 'SHORT_READ');
  });
});

describe('codec/wire uint64', () => {
  it('is big-endian', () => {
    expect(encode((s) => writeUint64(0x0102030405060708n, s))).toBe('0x0102030405060708');
    expect(readUint64(new BytesReader('0x00000000000001f4'))).toBe(500n);
  });

  it('round-trips the range boundaries', () => {
    for (const v of [0n, 1n, MAX_UINT64]) {
      expect(readUint64(new BytesReader(encode((s) => writeUint64(v, s))))).toBe(v);
    }
    expect(encode((s) => writeUint64(MAX_UINT64, s))).toBe('0xffffffffffffffff');
  });

  it('rejects values outside uint64', () => {
    expectError(() => writeUint64(-1n, new BytesWriter()), 'VALIDATION');
    expectError(() => writeUint64(MAX_UINT64 + 1n, new BytesWriter()), 'VALIDATION');
  });

  it('fails on a short stream', () => {
    expectError(() => readUint64(new BytesReader('0x01020304050607')), 'SHORT_READ');
  });
});

describe('codec/wire byte strings', () => {
  it('prefixes the payload with its uint64 length', () => {
    expect(encode((s) => writeByteString(new Uint8Array([0xde, 0xad]), s))).toBe(
      '0x0000000000000002dead',
    );
    expect(encode((s) => writeByteString('0xbeef', s))).toBe('0x0000000000000002beef');
  });

  it('rejects hex input that is not whole bytes', () => {
    const sink = new BytesWriter();
    expectError(() => writeByteString('0xabc', sink), 'VALIDATION');
    expect(sink.length).toBe(0);
  });

  it('round-trips the empty string', () => {
    const hex = encode((s) => writeByteString(new Uint8Array(0), s));
    expect(hex).toBe('0x0000000000000000');
    expect(readByteString(new BytesReader(hex), 0).length).toBe(0);
  });

  it('accepts a string exactly maxBytesToRead long', () => {
    const payload = Uint8Array.from({ length: 64 }, (_, i) => i);
    const hex = encode((s) => writeByteString(payload, s));
    expect(Array.from(readByteString(new BytesReader(hex), 64))).toEqual(Array.from(payload));
    expect(Array.from(readByteString(new BytesReader(hex), 64n))).toEqual(Array.from(payload));
  });

  it('fails with SIZE_EXCEEDED without reading past the prefix', () => {
    const reader = new BytesReader(encode((s) => writeByteString(new Uint8Array(5), s)));
    const err = expectError(() => readByteString(reader, 4), 'SIZE_EXCEEDED');
    expect(err.envelope.context).toEqual({ size: '5', max: '4' });
    expect(reader.offset).toBe(8);
    expect(reader.remaining).toBe(5);
  });

  it('produces a SIZE_EXCEEDED error that serializes to JSON', () => {
    const reader = new BytesReader(encode((s) => writeByteString(new Uint8Array(5), s)));
    const err = expectError(() => readByteString(reader, 4), 'SIZE_EXCEEDED');
    const json = JSON.parse(JSON.stringify(err));
    expect(json.type).toBe('SIZE_EXCEEDED');
    expect(json.context).toEqual({ size: '5', max: '4' });
  });

  it('fails with SHORT_READ when a large declared length outruns the stream', () => {
    // prefix claims 2^40 bytes, three follow
    const reader = new BytesReader('0x0000010000000000010203');
    const err = expectError(() => readByteString(reader, 2n ** 64n - 1n), 'SHORT_READ');
    expect(err.envelope.operation).toBe('codec.readByteString');
    expect(err.envelope.context).toEqual({ expected: 2 ** 40, received: 3 });
  });

  it('rejects a declared length no buffer can hold', () => {
    const reader = new BytesReader('0xffffffffffffffff');
    const err = expectError(() => readByteString(reader, 2n ** 64n - 1n), 'SIZE_EXCEEDED');
    expect(err.envelope.context).toEqual({
      size: '18446744073709551615',
      max: '9007199254740991',
    });
    expect(reader.remaining).toBe(0);
  });

  it('checks the declared length before the body exists', () => {
    // prefix claims 2^64 - 1 bytes and nothing follows
    const reader = new BytesReader('0xffffffffffffffff');
    expectError(() => readByteString(reader, 1024), 'SIZE_EXCEEDED');
  });

  it('fails on a truncated body or prefix', () => {
    const hex = encode((s) => writeByteString(new Uint8Array([1, 2, 3]), s));
    expectError(() => readByteString(truncated(hex), 16), 'SHORT_READ');
    expectError(() => readByteString(new BytesReader('0x000000'), 16), 'SHORT_READ');
  });

  it('rejects a negative limit', () => {
    expectError(() => readByteString(new BytesReader('0x'), -1), 'VALIDATION');
  });
});

describe('codec/wire sequencing', () => {
  it('decodes a mixed record field by field', () => {
    const hex = encode((s) => {
      writeUint64(7n, s);
      writeAddressPadded256(ADDR, s);
      writeHash(HASH, s);
      writeByteString(new Uint8Array([0x01]), s);
    });
    const r = new BytesReader(hex);
    expect(readUint64(r)).toBe(7n);
    expect(readAddressPadded256(r)).toBe(ADDR);
    expect(readHash(r)).toBe(HASH);
    expect(Array.from(readByteString(r, 1))).toEqual([1]);
    expect(r.remaining).toBe(0);
  });

  it('surfaces sink failures as WRITE_FAILURE', () => {
    let writes = 0;
    const flaky: ByteSink = {
      write() {
        writes += 1;
        if (writes > 1) throw new Error('closed');
      },
    };
    // prefix goes through, payload write fails
    expectError(() => writeByteString(new Uint8Array([1]), flaky), 'WRITE_FAILURE');
  });
});
