export * from './validation';
export * from './timeout';
export * from './result-set';
