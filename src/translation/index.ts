export * from './types';
export * from './resultParser';
export * from './batchTranslator';
export * from './prompts';
