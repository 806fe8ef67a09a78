export * from './types';
export * from './prompts';
export * from './llmFactory';
export { AnthropicLLMProvider } from './anthropicProvider';
export { OpenAILLMProvider } from './openaiProvider';
