export * from './retry';
export * from './validation';
export * from './uuid';
export * from './logger';
