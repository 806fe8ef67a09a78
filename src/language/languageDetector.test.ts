import { describe, it, expect, vi } from 'vitest';
import {
  TinyldLanguageClassifier,
  LanguageClassifier,
  detectEntriesLanguage,
  getLanguageName,
} from './languageDetector';
import { SubtitleEntry } from '../subtitles/types';

function makeEntries(texts: string[]): SubtitleEntry[] {
  return texts.map((text, i) => ({ index: i + 1, timing: '00:00:01,000 --> 00:00:02,000', text }));
}

describe('getLanguageName', () => {
  it('should return display names for known codes', () => {
    expect(getLanguageName('pt')).toBe('Portuguese');
    expect(getLanguageName('en')).toBe('English');
    expect(getLanguageName('unknown')).toBe('Unknown');
  });

  it('should fall back to the upper-cased code', () => {
    expect(getLanguageName('xx')).toBe('XX');
  });
});

describe('TinyldLanguageClassifier', () => {
  const classifier = new TinyldLanguageClassifier();

  it('should return unknown for text with too little signal', () => {
    expect(classifier.classify('Hi!')).toBe('unknown');
    expect(classifier.classify('Oi, tudo?')).toBe('unknown');
    expect(classifier.classify('!!! ??? ... ---')).toBe('unknown');
    expect(classifier.classify('')).toBe('unknown');
  });

  it('should detect English text', () => {
    const text =
      'Hello, this is a test subtitle. This is the second subtitle entry, ' +
      'and this is the third one, which we are writing in plain English.';
    expect(classifier.classify(text)).toBe('en');
  });
});

describe('detectEntriesLanguage', () => {
  it('should classify stripped samples joined with spaces', () => {
    const classify = vi.fn().mockReturnValue('en');
    const classifier: LanguageClassifier = { classify };
    const entries = makeEntries(['<i>Hello there friend</i>', 'Hi', 'How are you doing today']);

    expect(detectEntriesLanguage(entries, classifier)).toBe('en');
    expect(classify).toHaveBeenCalledWith('Hello there friend How are you doing today');
  });

  it('should use at most five samples', () => {
    const classify = vi.fn().mockReturnValue('en');
    const entries = makeEntries(Array.from({ length: 12 }, (_, i) => `Sentence number ${i + 1}`));

    detectEntriesLanguage(entries, { classify });
    expect(classify).toHaveBeenCalledWith(
      'Sentence number 1 Sentence number 2 Sentence number 3 Sentence number 4 Sentence number 5'
    );
  });

  it('should only sample the leading entries', () => {
    const classify = vi.fn().mockReturnValue('fr');
    const entries = makeEntries([
      ...Array.from({ length: 10 }, () => 'Oi'),
      'Bonjour tout le monde',
    ]);

    expect(detectEntriesLanguage(entries, { classify })).toBe('unknown');
    expect(classify).not.toHaveBeenCalled();
  });

  it('should return unknown for no entries', () => {
    const classify = vi.fn();
    expect(detectEntriesLanguage([], { classify })).toBe('unknown');
    expect(classify).not.toHaveBeenCalled();
  });
});
