export * from './config';
export * from './alias';
export * from './tx-types';
