import { HttpError } from './errors';
import { LLMProviderType, LLM_PROVIDER_TYPES } from '../llm/types';

export interface TranslateRequestFields {
  sourceLanguage?: string;
  targetLanguage?: string;
  maxEntries?: number;
  contextRadius?: number;
  provider?: LLMProviderType;
}

function readField(body: unknown, key: string): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Reflect.get(body, key);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function readIntegerField(body: unknown, key: string): number | undefined {
  const value = readField(body, key);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new HttpError(400, `${key} must be a non-negative integer`);
  }
  return parseInt(value, 10);
}

function readProviderField(body: unknown, key: string): LLMProviderType | undefined {
  const value = readField(body, key);
  if (value === undefined) return undefined;
  const provider = LLM_PROVIDER_TYPES.find((type) => type === value);
  if (!provider) {
    throw new HttpError(400, `${key} must be one of: ${LLM_PROVIDER_TYPES.join(', ')}`);
  }
  return provider;
}

/**
 * Reads the optional text fields of a translate request.
 * Blank fields count as absent; malformed ones raise a 400.
 */
export function parseTranslateFields(body: unknown): TranslateRequestFields {
  return {
    sourceLanguage: readField(body, 'sourceLang'),
    targetLanguage: readField(body, 'targetLang'),
    maxEntries: readIntegerField(body, 'maxEntries'),
    contextRadius: readIntegerField(body, 'contextRadius'),
    provider: readProviderField(body, 'provider'),
  };
}
