/**
 * Subtitle Translator
 *
 * Translates subtitle entries one at a time through an LLM provider, using a
 * target-language reference file for style (global guide) and for local
 * context (window of neighbouring entries).
 *
 * A failed entry never stops the run: it keeps its source text and is counted
 * in the statistics.
 */

import { LLMProvider } from '../llm/types';
import { buildTranslationPrompt } from '../llm/prompts';
import { SubtitleEntry } from '../subtitles/types';
import {
  DEFAULT_CONTEXT_RADIUS,
  DEFAULT_GUIDE_MAX_ENTRIES,
  buildGlobalGuide,
  buildLocalWindow,
  stripMarkup,
} from '../subtitles/subtitleUtils';
import { LanguageClassifier, detectEntriesLanguage, getLanguageName } from '../language/languageDetector';
import { collapseBlankLines, sanitizeTranslation } from './sanitize';
import {
  EntryTranslation,
  EntryTranslationContext,
  TranslateSubtitlesOptions,
  TranslateSubtitlesResult,
  TranslationStats,
} from './types';
import { logger } from '../utils/logger';

export const DEFAULT_MAX_TOKENS = 1000;

export interface SubtitleTranslatorOptions {
  /** Cap on the size of each model reply, in tokens */
  maxTokens?: number;
}

export class SubtitleTranslator {
  private provider: LLMProvider;
  private classifier: LanguageClassifier;
  private maxTokens: number;

  constructor(provider: LLMProvider, classifier: LanguageClassifier, options: SubtitleTranslatorOptions = {}) {
    this.provider = provider;
    this.classifier = classifier;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  /**
   * Translates one entry. Never throws: provider failures fall back to the
   * markup-stripped source text, the same text an unchanged reply produces.
   */
  async translateEntry(entry: SubtitleEntry, context: EntryTranslationContext): Promise<EntryTranslation> {
    // Removing a tag-only line can leave a blank line behind
    const sourceText = collapseBlankLines(stripMarkup(entry.text));
    if (!sourceText) {
      return { entry, outcome: 'skipped' };
    }

    const fallback: SubtitleEntry = { index: entry.index, timing: entry.timing, text: sourceText };

    const prompt = buildTranslationPrompt({
      sourceText,
      sourceLanguage: context.sourceLanguage,
      targetLanguage: context.targetLanguage,
      globalGuide: context.globalGuide,
      localWindow: context.localWindow,
    });

    let response: string;
    try {
      response = await this.provider.complete(prompt, { maxTokens: this.maxTokens });
    } catch (error) {
      logger.error(
        `Error translating subtitle ${entry.index}: ${error instanceof Error ? error.message : String(error)}`
      );
      return { entry: fallback, outcome: 'failed', failureReason: 'service-error' };
    }

    const translatedText = sanitizeTranslation(response, context.targetLanguage);
    if (!translatedText) {
      logger.warn(`Translation of subtitle ${entry.index} was empty after cleaning, using original text`);
      return { entry: fallback, outcome: 'failed', failureReason: 'empty-response' };
    }

    const translated: SubtitleEntry = { index: entry.index, timing: entry.timing, text: translatedText };

    if (translatedText === sourceText) {
      return { entry: translated, outcome: 'failed', failureReason: 'unchanged' };
    }

    return { entry: translated, outcome: 'successful' };
  }

  /**
   * Translates a subtitle sequence against a target-language reference sequence.
   * Entries are processed strictly in order, one provider call at a time.
   * @param sourceEntries - Subtitles to translate
   * @param contextEntries - Reference subtitles in the target language
   */
  async translateSubtitles(
    sourceEntries: readonly SubtitleEntry[],
    contextEntries: readonly SubtitleEntry[],
    options: TranslateSubtitlesOptions = {}
  ): Promise<TranslateSubtitlesResult> {
    const sourceCode = options.sourceLanguage ?? detectEntriesLanguage(sourceEntries, this.classifier);
    const targetCode = options.targetLanguage ?? detectEntriesLanguage(contextEntries, this.classifier);
    const sourceLanguage = getLanguageName(sourceCode);
    const targetLanguage = getLanguageName(targetCode);

    logger.info(`Translating from ${sourceLanguage} to ${targetLanguage}`);

    let entries = sourceEntries;
    if (options.maxEntries !== undefined) {
      entries = sourceEntries.slice(0, Math.max(0, options.maxEntries));
      logger.info(`TEST MODE: Limiting translation to first ${options.maxEntries} entries`);
    }

    const globalGuide = buildGlobalGuide(contextEntries, options.guideMaxEntries ?? DEFAULT_GUIDE_MAX_ENTRIES);
    const contextRadius = options.contextRadius ?? DEFAULT_CONTEXT_RADIUS;

    const results: EntryTranslation[] = [];
    for (const [i, entry] of entries.entries()) {
      logger.info(`Translating subtitle ${i + 1}/${entries.length}`);

      const localWindow = buildLocalWindow(contextEntries, i, contextRadius);
      results.push(
        await this.translateEntry(entry, { sourceLanguage, targetLanguage, globalGuide, localWindow })
      );
    }

    const stats = summarize(results, sourceLanguage, targetLanguage);
    logger.info(`Translation completed. Success rate: ${(stats.successRate * 100).toFixed(1)}%`);

    return {
      entries: results.map((result) => result.entry),
      results,
      stats,
    };
  }
}

/**
 * Counts outcomes into run statistics
 */
export function summarize(
  results: readonly EntryTranslation[],
  sourceLanguage: string,
  targetLanguage: string
): TranslationStats {
  const count = (outcome: EntryTranslation['outcome']): number =>
    results.filter((result) => result.outcome === outcome).length;

  const totalEntries = results.length;
  const successfulTranslations = count('successful');

  return {
    totalEntries,
    successfulTranslations,
    failedTranslations: count('failed'),
    skippedEntries: count('skipped'),
    successRate: totalEntries > 0 ? successfulTranslations / totalEntries : 0,
    sourceLanguage,
    targetLanguage,
  };
}
