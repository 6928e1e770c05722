export * from './llm/fake';
export * from './logger/fake';
export * from './logger/pino';
export * from './notify/fake';
export * from './notify/smtp';
export * from './openai/llm';
export * from './render/html';
export * from './render/pdf';
export * from './search/fake';
export * from './storage/fake';
export * from './storage/local';
