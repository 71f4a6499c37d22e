export * from './types';
export * from './interfaces';
export * from './errors';
export * from './utils';
export * from './config';
export * from './base-adapter';
export * from './dialect';
export * from './query';
export * from './schema';
export * from './orm';
