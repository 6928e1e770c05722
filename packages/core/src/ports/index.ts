export * from './llm';
export * from './logger';
export * from './notifier';
export * from './renderer';
export * from './search';
export * from './storage';
