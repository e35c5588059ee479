export * from './with-telemetry';
