import { readSrtFile, writeSrtFile } from '../subtitles';
import { SubtitleTranslator } from '../translation/translator';
import { TranslateSubtitlesOptions, TranslationStats } from '../translation/types';
import { LLMProviderType, LLMProviderOverrides, createLLMProvider } from '../llm';
import { LanguageClassifier, TinyldLanguageClassifier } from '../language/languageDetector';
import { config } from '../config';
import { logger } from '../utils/logger';

export interface TranslationRunOptions extends TranslateSubtitlesOptions {
  /** SRT file to translate */
  sourcePath: string;
  /** SRT file in the target language, used as reference */
  contextPath: string;
  /** Where the translated SRT file is written (overwritten if present) */
  outputPath: string;
}

/**
 * Pipeline for translating one SRT file into another
 */
export class TranslationPipeline {
  private translator: SubtitleTranslator;

  constructor(translator: SubtitleTranslator) {
    this.translator = translator;
  }

  /**
   * Runs the complete pipeline: read both files, translate, write the output once
   */
  async run(options: TranslationRunOptions): Promise<TranslationStats> {
    logger.info('Starting SRT translation process...');

    // Stage 1: Parse subtitles
    const sourceEntries = await readSrtFile(options.sourcePath);
    const contextEntries = await readSrtFile(options.contextPath);

    // Stage 2: Translate entry by entry
    const { entries, stats } = await this.translator.translateSubtitles(sourceEntries, contextEntries, {
      sourceLanguage: options.sourceLanguage,
      targetLanguage: options.targetLanguage,
      maxEntries: options.maxEntries,
      contextRadius: options.contextRadius ?? config.contextRadius,
      guideMaxEntries: options.guideMaxEntries ?? config.guideMaxEntries,
    });

    // Stage 3: Write SRT
    await writeSrtFile(options.outputPath, entries);

    return { ...stats, outputFile: options.outputPath };
  }
}

export interface PipelineFactoryOptions extends LLMProviderOverrides {
  provider?: LLMProviderType;
  maxTokens?: number;
  classifier?: LanguageClassifier;
}

/**
 * Builds a translator from the environment configuration plus overrides
 */
export function createSubtitleTranslator(options: PipelineFactoryOptions = {}): SubtitleTranslator {
  const provider = createLLMProvider(options.provider ?? config.llmProvider, {
    model: options.model,
    apiBase: options.apiBase,
  });

  return new SubtitleTranslator(provider, options.classifier ?? new TinyldLanguageClassifier(), {
    maxTokens: options.maxTokens ?? config.llmMaxTokens,
  });
}

/**
 * Builds a pipeline from the environment configuration plus overrides
 */
export function createTranslationPipeline(options: PipelineFactoryOptions = {}): TranslationPipeline {
  return new TranslationPipeline(createSubtitleTranslator(options));
}
