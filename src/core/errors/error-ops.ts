// src/core/errors/error-ops.ts

import { createError, shapeCause } from './factory';
import {
  isBoundaryError,
  type BoundaryError,
  type TryResult,
  type ErrorEnvelope,
  type ErrorType,
  type Resource,
} from '../types/errors';

type Ctx = Record<string, unknown>;

type WrapOptions<TCtx extends Ctx = Ctx> = {
  /** Optional contextual data for debugging */
  ctx?: TCtx;
  /** Optional error message */
  message?: string | (() => string);
};

function resolveMessage(op: string, msg?: string | (() => string)) {
  if (!msg) return `Error during ${op}.`;
  return typeof msg === 'function' ? msg() : msg;
}

// Wraps an unknown error into a BoundaryError of the given type, preserving context.
export function toBoundaryError(
  type: ErrorType,
  base: Omit<ErrorEnvelope, 'type' | 'cause'>,
  err: unknown,
): BoundaryError {
  if (isBoundaryError(err)) return err;
  return createError(type, { ...base, cause: shapeCause(err) });
}

/**
 * Factory for resource-scoped error handlers.
 * Example:
 *   const { wrap, wrapAs, toResult } = createErrorHandlers('events');
 *
 * Everything at this layer is synchronous, so unlike network-facing handlers
 * these never return promises.
 */
export function createErrorHandlers(resource: Resource) {
  function run<T, TCtx extends Ctx = Ctx>(
    kind: ErrorType,
    operation: string,
    fn: () => T,
    opts?: WrapOptions<TCtx>,
  ): T {
    try {
      return fn();
    } catch (e) {
      // If already shaped, preserve it; else wrap with chosen kind.
      if (isBoundaryError(e)) throw e;
      const message = resolveMessage(operation, opts?.message);
      throw toBoundaryError(kind, { resource, operation, context: opts?.ctx ?? {}, message }, e);
    }
  }

  function wrap<T, TCtx extends Ctx = Ctx>(
    operation: string,
    fn: () => T,
    opts?: WrapOptions<TCtx>,
  ): T {
    return run('INTERNAL', operation, fn, opts);
  }

  function wrapAs<T, TCtx extends Ctx = Ctx>(
    kind: ErrorType,
    operation: string,
    fn: () => T,
    opts?: WrapOptions<TCtx>,
  ): T {
    return run(kind, operation, fn, opts);
  }

  function toResult<T, TCtx extends Ctx = Ctx>(
    operation: string,
    fn: () => T,
    opts?: WrapOptions<TCtx>,
  ): TryResult<T> {
    try {
      const value = wrap(operation, fn, opts);
      return { ok: true, value };
    } catch (e) {
      // wrap() only ever throws shaped errors
      const shaped = isBoundaryError(e)
        ? e
        : toBoundaryError(
            'INTERNAL',
            {
              resource,
              operation,
              context: opts?.ctx ?? {},
              message: resolveMessage(operation, opts?.message),
            },
            e,
          );
      return { ok: false, error: shaped };
    }
  }

  return { wrap, wrapAs, toResult };
}
