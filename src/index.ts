// index.ts

export * as constants from './core/constants';

export * as abi from './core/abi';

export * as errors from './core/errors/factory';
export { formatEnvelopePretty } from './core/errors/formatter';
export { createErrorHandlers, toBoundaryError } from './core/errors/error-ops';
export { BoundaryError, isBoundaryError, OP_CODEC, OP_ALIASING, OP_EVENTS } from './core/types/errors';

export * from './core/utils/addr';

// Stream codec & word helpers
export * from './core/codec';

// Core resources (aliasing, events, logs)
export * from './core/resources/aliasing';
export * from './core/resources/events';

// Core types (type-only so we don't emit)
export type * from './core/types/errors';
export type * from './core/types/primitives';
export type * from './core/types/transactions';
