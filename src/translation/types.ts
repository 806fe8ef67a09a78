import { SubtitleEntry } from '../subtitles/types';

/**
 * What happened to a single entry
 */
export type TranslationOutcome = 'successful' | 'failed' | 'skipped';

/**
 * Why an entry counts as failed
 * - service-error: the provider call threw
 * - empty-response: nothing was left after cleaning the reply
 * - unchanged: the reply equals the source text
 */
export type FailureReason = 'service-error' | 'empty-response' | 'unchanged';

/**
 * Result of translating one entry.
 * Failed entries carry the markup-stripped source text, never blank text.
 */
export interface EntryTranslation {
  entry: SubtitleEntry;
  outcome: TranslationOutcome;
  failureReason?: FailureReason;
}

/**
 * Shared context for every entry of a run
 */
export interface EntryTranslationContext {
  /** Display name of the source language */
  sourceLanguage: string;
  /** Display name of the target language */
  targetLanguage: string;
  globalGuide: string;
  localWindow: string;
}

export interface TranslateSubtitlesOptions {
  /** Source language code; detected from the source entries when omitted */
  sourceLanguage?: string;
  /** Target language code; detected from the context entries when omitted */
  targetLanguage?: string;
  /** Only translate this many leading entries */
  maxEntries?: number;
  /** Neighbours on each side in the local context window */
  contextRadius?: number;
  /** Entries sampled for the global guide */
  guideMaxEntries?: number;
}

/**
 * Run statistics
 */
export interface TranslationStats {
  totalEntries: number;
  successfulTranslations: number;
  failedTranslations: number;
  skippedEntries: number;
  /** successful / total, 0 when there is nothing to translate */
  successRate: number;
  /** Display name */
  sourceLanguage: string;
  /** Display name */
  targetLanguage: string;
  outputFile?: string;
}

export interface TranslateSubtitlesResult {
  entries: SubtitleEntry[];
  results: EntryTranslation[];
  stats: TranslationStats;
}
