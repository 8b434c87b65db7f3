export * from './schema';
export * from './decoder';
export * from './redeem-scheduled';
export * from './logs';
