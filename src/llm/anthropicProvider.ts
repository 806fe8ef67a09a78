import Anthropic from '@anthropic-ai/sdk';
import { CompletionOptions, LLMProvider, LLMProviderConfig, LLMServiceError } from './types';
import { logger } from '../utils/logger';

export class AnthropicLLMProvider implements LLMProvider {
  readonly type = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'anthropic') {
      throw new Error('Invalid config type for AnthropicLLMProvider');
    }

    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.apiBase || undefined,
      maxRetries: config.maxRetries ?? 2,
    });
    this.model = config.model ?? 'claude-3-5-sonnet-latest';
  }

  async testConnection(): Promise<boolean> {
    try {
      // Simple test message
      await this.client.messages.create({
        model: this.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch (error) {
      logger.debug(`Anthropic connection test failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    let text: string | undefined;
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: options.maxTokens,
        messages: [
          {
            role: 'user',
            content: prompt,
          },
        ],
      });

      const textBlock = response.content.find((block) => block.type === 'text');
      text = textBlock?.type === 'text' ? textBlock.text : undefined;
    } catch (error) {
      throw new LLMServiceError(
        `Anthropic request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.type,
        { cause: error }
      );
    }

    if (text === undefined) {
      throw new LLMServiceError('No text response from Anthropic', this.type);
    }

    return text.trim();
  }
}
