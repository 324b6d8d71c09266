export * from './types';
export * from './errors';
export * from './constants';
export * from './utils';
export * from './surql';
export * from './middleware';
export * from './batch';
export * from './transaction';
export * from './base-session';
export * from './memory';
