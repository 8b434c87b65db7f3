// src/core/abi.ts

export { ArbRetryableTxABI } from './internal/abi-registry';
