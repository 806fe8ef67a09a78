import { detect } from 'tinyld';
import languageNames from './languages.json';
import { SubtitleEntry } from '../subtitles/types';
import { stripMarkup } from '../subtitles/subtitleUtils';
import { logger } from '../utils/logger';

export const UNKNOWN_LANGUAGE = 'unknown';

/** Minimum amount of text (after removing punctuation) worth classifying */
export const MIN_SIGNAL_LENGTH = 10;

const LANGUAGE_NAMES: Readonly<Record<string, string>> = languageNames;

/**
 * Classifies text into an ISO 639-1 code, or "unknown"
 */
export interface LanguageClassifier {
  classify(text: string): string;
}

/**
 * Language classifier backed by tinyld.
 * tinyld is deterministic, so two instances give the same answer for the same text.
 */
export class TinyldLanguageClassifier implements LanguageClassifier {
  classify(text: string): string {
    const cleanText = text.replace(/[^\p{L}\p{N}_\s]/gu, '').trim();
    if (cleanText.length < MIN_SIGNAL_LENGTH) {
      return UNKNOWN_LANGUAGE;
    }

    try {
      const code = detect(cleanText);
      return code || UNKNOWN_LANGUAGE;
    } catch (error) {
      logger.warn(
        `Language detection failed: ${error instanceof Error ? error.message : String(error)}`
      );
      return UNKNOWN_LANGUAGE;
    }
  }
}

/**
 * Gets a display name for an ISO code, falling back to the upper-cased code
 */
export function getLanguageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code.toUpperCase();
}

/**
 * Detects the language of a subtitle sequence from a sample of its first entries
 * @param entries - Parsed subtitles
 * @param classifier - Caller-owned classifier
 * @param sampleSize - How many leading entries to sample
 * @returns ISO code or "unknown"
 */
export function detectEntriesLanguage(
  entries: readonly SubtitleEntry[],
  classifier: LanguageClassifier,
  sampleSize: number = 10
): string {
  const samples = entries
    .slice(0, sampleSize)
    .map((entry) => stripMarkup(entry.text))
    .filter((text) => text.length > 5)
    .slice(0, 5);

  if (samples.length === 0) {
    return UNKNOWN_LANGUAGE;
  }

  return classifier.classify(samples.join(' '));
}
