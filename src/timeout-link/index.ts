export * from './timeout-link';
