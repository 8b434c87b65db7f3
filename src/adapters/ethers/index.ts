// index.ts
export * from './resources/events';
