// src/core/codec/index.ts
export * from './stream';
export * from './wire';
export * from './words';
