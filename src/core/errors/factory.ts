// src/core/errors/factory.ts
import { BoundaryError, type ErrorEnvelope, type ErrorType } from '../types/errors';

/** Creates a BoundaryError of the specified type, with the provided details. */
export function createError(type: ErrorType, input: Omit<ErrorEnvelope, 'type'>): BoundaryError {
  return new BoundaryError({ ...input, type });
}

/** Extracts and shapes the cause of an error into a standardized format. */
export function shapeCause(err: unknown) {
  const isRecord = (x: unknown): x is Record<string, unknown> =>
    x !== null && typeof x === 'object';

  const r = isRecord(err) ? err : undefined;

  const name = r && typeof r.name === 'string' ? r.name : undefined;
  const message =
    r && typeof r.message === 'string'
      ? r.message
      : r && typeof r.shortMessage === 'string'
        ? r.shortMessage
        : typeof err === 'string'
          ? err
          : undefined;
  const code = r && 'code' in r ? r.code : undefined;

  return { name, message, code };
}
