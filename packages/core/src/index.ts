export * from './config';
export * from './entities';
export * from './errors';
export * from './lifecycle';
export * from './ports';
export * from './utils';
