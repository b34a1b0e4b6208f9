export * from './types';
export * from './openaiProvider';
export * from './anthropicProvider';
export * from './llmFactory';
