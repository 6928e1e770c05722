export * from './bot';
export * from './cli/format';
export * from './config/resolveConfig';
export * from './history/persistedMessage';
export * from './history/sessionHistoryStore';
export * from './prompts/children';
export * from './prompts/templates';
export * from './resources/lifecycle';
export * from './service/worksheetService';
export * from './worksheet/worksheetTextParser';
