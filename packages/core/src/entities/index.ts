export * from './json';
export * from './message';
export * from './session';
export * from './worksheet';
