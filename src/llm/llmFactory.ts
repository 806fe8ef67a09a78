import { LLMProvider, LLMProviderConfig, LLMProviderType, LLM_PROVIDER_TYPES } from './types';
import { OpenAILLMProvider } from './openaiProvider';
import { AnthropicLLMProvider } from './anthropicProvider';
import { config } from '../config';
import { logger } from '../utils/logger';

/**
 * Overrides applied on top of the environment configuration
 */
export interface LLMProviderOverrides {
  model?: string;
  apiBase?: string;
}

/**
 * Factory function to create LLM providers
 */
export function createLLMProvider(
  providerType: LLMProviderType,
  overrides: LLMProviderOverrides = {}
): LLMProvider {
  switch (providerType) {
    case 'openai':
      logger.debug(`Creating OpenAI provider with model: ${overrides.model ?? config.openaiModel}`);
      return new OpenAILLMProvider({
        type: 'openai',
        apiKey: config.openaiApiKey,
        model: overrides.model ?? config.openaiModel,
        apiBase: overrides.apiBase ?? config.openaiApiBase,
        maxRetries: config.llmMaxRetries,
      });

    case 'anthropic':
      logger.debug(`Creating Anthropic provider with model: ${overrides.model ?? config.anthropicModel}`);
      return new AnthropicLLMProvider({
        type: 'anthropic',
        apiKey: config.anthropicApiKey,
        model: overrides.model ?? config.anthropicModel,
        apiBase: overrides.apiBase ?? config.anthropicBaseUrl,
        maxRetries: config.llmMaxRetries,
      });

    default:
      throw new Error(`Unknown LLM provider type: ${String(providerType)}`);
  }
}

/**
 * Creates an LLM provider from a custom config
 */
export function createLLMProviderFromConfig(providerConfig: LLMProviderConfig): LLMProvider {
  switch (providerConfig.type) {
    case 'openai':
      return new OpenAILLMProvider(providerConfig);
    case 'anthropic':
      return new AnthropicLLMProvider(providerConfig);
    default:
      throw new Error(`Unknown LLM provider type: ${String(providerConfig.type)}`);
  }
}

/**
 * Narrows user input (CLI flag, form field) to a provider type
 */
export function isLLMProviderType(value: string): value is LLMProviderType {
  return LLM_PROVIDER_TYPES.some((type) => type === value);
}

/**
 * Tests all configured providers and returns availability
 */
export async function testAllProviders(): Promise<Map<LLMProviderType, boolean>> {
  const results = new Map<LLMProviderType, boolean>();

  for (const providerType of LLM_PROVIDER_TYPES) {
    try {
      const provider = createLLMProvider(providerType);
      const isAvailable = await provider.testConnection();
      results.set(providerType, isAvailable);
    } catch (error) {
      logger.debug(`${providerType} provider unavailable: ${error instanceof Error ? error.message : String(error)}`);
      results.set(providerType, false);
    }
  }

  return results;
}
