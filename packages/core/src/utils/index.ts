export * from './date';
export * from './timeout';
