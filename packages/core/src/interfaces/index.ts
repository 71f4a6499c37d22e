export * from './database-adapter';
