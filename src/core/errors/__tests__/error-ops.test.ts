import { describe, it, expect } from 'vitest';
import { createErrorHandlers, toBoundaryError } from '../error-ops';
import { createError } from '../factory';
import { isBoundaryError } from '../../types/errors';

const { wrap, wrapAs, toResult } = createErrorHandlers('events');

describe('errors/error-ops.toBoundaryError', () => {
  it('wraps foreign errors and shapes the cause', () => {
    const err = toBoundaryError(
      'WRITE_FAILURE',
      { resource: 'codec', operation: 'codec.writeAll', message: 'write failed' },
      new Error('EPIPE'),
    );
    expect(err.type).toBe('WRITE_FAILURE');
    expect(err.envelope.cause).toEqual({ name: 'Error', message: 'EPIPE', code: undefined });
  });

  it('returns BoundaryErrors untouched', () => {
    const original = createError('SHORT_READ', {
      resource: 'codec',
      operation: 'codec.readHash',
      message: 'short',
    });
    const err = toBoundaryError(
      'INTERNAL',
      { resource: 'codec', operation: 'x', message: 'y' },
      original,
    );
    expect(err).toBe(original);
  });
});

describe('errors/error-ops.createErrorHandlers', () => {
  it('wrap returns the value when nothing throws', () => {
    expect(wrap('events.decode', () => 42)).toBe(42);
  });

  it('wrap tags foreign errors as INTERNAL with the default message', () => {
    try {
      wrap('events.decode', () => {
        throw new Error('kaboom');
      });
      expect.unreachable();
    } catch (e) {
      expect(isBoundaryError(e)).toBe(true);
      if (!isBoundaryError(e)) return;
      expect(e.type).toBe('INTERNAL');
      expect(e.envelope.resource).toBe('events');
      expect(e.envelope.message).toBe('Error during events.decode.');
    }
  });

  it('wrapAs uses the requested kind, message and context', () => {
    try {
      wrapAs(
        'DECODE',
        'events.decode:data',
        () => {
          throw new Error('bad data');
        },
        { ctx: { event: 'E()' }, message: () => 'could not unpack' },
      );
      expect.unreachable();
    } catch (e) {
      if (!isBoundaryError(e)) throw e;
      expect(e.type).toBe('DECODE');
      expect(e.envelope.message).toBe('could not unpack');
      expect(e.envelope.context).toEqual({ event: 'E()' });
    }
  });

  it('toResult returns ok/err results', () => {
    expect(toResult('op', () => 'v')).toEqual({ ok: true, value: 'v' });

    const res = toResult('op', () => {
      throw new Error('nope');
    });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.type).toBe('INTERNAL');
  });
});
