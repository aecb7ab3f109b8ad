export * from './common';
export * from './errors';
export type * from './config';
