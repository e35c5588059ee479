export * from './with-express';
