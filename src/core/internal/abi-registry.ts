// src/core/internal/abi-registry.ts
export { default as ArbRetryableTxABI } from './abis/ArbRetryableTx';
