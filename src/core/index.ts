// src/core/index.ts
export {
  L1_TO_L2_ALIAS_OFFSET,
  L2_TX_TYPE,
  ARB_RETRYABLE_TX_ADDRESS,
  TOPIC_REDEEM_SCHEDULED,
  ZERO_ADDRESS,
  ZERO_HASH,
} from './constants';

export * as errors from './errors/factory';
export { formatEnvelopePretty } from './errors/formatter';
export { createErrorHandlers, toBoundaryError } from './errors/error-ops';
export { BoundaryError, isBoundaryError, OP_CODEC, OP_ALIASING, OP_EVENTS } from './types/errors';

export * from './utils/addr';
export * from './codec';

// Core resources (aliasing, events, logs)
export * from './resources/aliasing';
export * from './resources/events';

// Core types (type-only)
export type * from './types/errors';
export type * from './types/primitives';
export type * from './types/transactions';
