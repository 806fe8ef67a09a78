import { describe, it, expect } from 'vitest';
import { parseTranslateFields } from './requestFields';
import { HttpError } from './errors';

describe('parseTranslateFields', () => {
  it('should read every supported field', () => {
    expect(
      parseTranslateFields({
        sourceLang: 'en',
        targetLang: ' pt ',
        maxEntries: '5',
        contextRadius: '0',
        provider: 'openai',
      })
    ).toEqual({
      sourceLanguage: 'en',
      targetLanguage: 'pt',
      maxEntries: 5,
      contextRadius: 0,
      provider: 'openai',
    });
  });

  it('should treat missing and blank fields as absent', () => {
    expect(parseTranslateFields({ sourceLang: '   ' })).toEqual({
      sourceLanguage: undefined,
      targetLanguage: undefined,
      maxEntries: undefined,
      contextRadius: undefined,
      provider: undefined,
    });
    expect(parseTranslateFields(undefined).maxEntries).toBeUndefined();
  });

  it('should reject malformed integers with a 400', () => {
    expect(() => parseTranslateFields({ maxEntries: '-1' })).toThrow(HttpError);
    try {
      parseTranslateFields({ contextRadius: 'ten' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(HttpError);
      expect(error).toMatchObject({ status: 400, message: 'contextRadius must be a non-negative integer' });
    }
  });

  it('should reject unknown providers', () => {
    expect(() => parseTranslateFields({ provider: 'cohere' })).toThrow(
      'provider must be one of: anthropic, openai'
    );
  });
});
