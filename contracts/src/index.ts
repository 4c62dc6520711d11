export * from './bank';
export * from './chain';
export * from './constants';
export * from './entryLedger';
export * from './errors';
export * from './guard';
export * from './hashing';
export * from './market';
export * from './payout';
export * from './randomness';
export * from './treasury';
export * from './types';
