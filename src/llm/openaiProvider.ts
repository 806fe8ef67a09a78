import OpenAI from 'openai';
import { CompletionOptions, LLMProvider, LLMProviderConfig, LLMServiceError } from './types';
import { logger } from '../utils/logger';

export class OpenAILLMProvider implements LLMProvider {
  readonly type = 'openai' as const;
  readonly model: string;
  private client: OpenAI;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'openai') {
      throw new Error('Invalid config type for OpenAILLMProvider');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiBase || undefined,
      maxRetries: config.maxRetries ?? 2,
    });
    this.model = config.model ?? 'gpt-4o';
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (error) {
      logger.debug(`OpenAI connection test failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          {
            role: 'user',
            content: prompt,
          },
        ],
        max_tokens: options.maxTokens,
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw new LLMServiceError(
        `OpenAI request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.type,
        { cause: error }
      );
    }

    if (content === null || content === undefined) {
      throw new LLMServiceError('No text response from OpenAI', this.type);
    }

    return content.trim();
  }
}
