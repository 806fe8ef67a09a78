/**
 * Supported LLM provider types
 */
export type LLMProviderType = 'openai' | 'anthropic';

export const LLM_PROVIDER_TYPES: readonly LLMProviderType[] = ['anthropic', 'openai'];

/**
 * Configuration for an LLM provider
 */
export interface LLMProviderConfig {
  type: LLMProviderType;
  apiKey: string;
  model?: string;
  /** Endpoint override (OpenAI-compatible gateways, proxies) */
  apiBase?: string;
  /** Transport retries, handled by the SDK client */
  maxRetries?: number;
}

/**
 * Per-call options
 */
export interface CompletionOptions {
  /** Cap on the size of the response, in tokens */
  maxTokens: number;
}

/**
 * Raised when a provider call fails for any reason (network, auth, rate limit, bad response)
 */
export class LLMServiceError extends Error {
  constructor(
    message: string,
    readonly provider: LLMProviderType,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LLMServiceError';
  }
}

/**
 * LLM Provider interface - all providers must implement this
 */
export interface LLMProvider {
  /**
   * Provider type identifier
   */
  readonly type: LLMProviderType;

  /**
   * Model identifier sent with every request
   */
  readonly model: string;

  /**
   * Sends a single-turn prompt and returns the text of the reply
   * @throws LLMServiceError on any failure
   */
  complete(prompt: string, options: CompletionOptions): Promise<string>;

  /**
   * Tests the connection to the LLM provider
   * @returns True if connection is successful
   */
  testConnection(): Promise<boolean>;
}
