export type * from './types';

export * from './timeout-link';
export * from './budget';
export * from './attribution';
export * from './cancellation';
export * from './host';
export * from './config';
export * from './logger';
export * from './with-telemetry';
export * from './with-express';
