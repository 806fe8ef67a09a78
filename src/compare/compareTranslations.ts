import { SubtitleEntry } from '../subtitles/types';
import { stripMarkup } from '../subtitles/subtitleUtils';

/** How many reference entries are scanned for a match */
export const REFERENCE_SCAN_LIMIT = 50;

export type SimilarityVerdict = 'low' | 'good' | 'high';

export interface ReferenceMatch {
  text: string;
  commonWords: number;
}

export interface ComparisonRow {
  position: number;
  index: number;
  timing: string;
  sourceText: string;
  translatedText: string;
  similarity: number;
  reference?: ReferenceMatch;
}

export interface ComparisonReport {
  sourceCount: number;
  translatedCount: number;
  /** Undefined when no reference file was given */
  referenceCount?: number;
  rows: ComparisonRow[];
  showSimilarity: boolean;
  averageSimilarity?: number;
  verdict?: SimilarityVerdict;
}

export interface CompareOptions {
  source: readonly SubtitleEntry[];
  translated: readonly SubtitleEntry[];
  reference?: readonly SubtitleEntry[];
  maxEntries?: number;
  showSimilarity?: boolean;
}

function wordSet(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/\s+/)
      .filter((word) => word)
  );
}

/**
 * Jaccard similarity of the lower-cased word sets of two texts
 */
export function calculateSimilarity(a: string, b: string): number {
  const wordsA = wordSet(a);
  const wordsB = wordSet(b);
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }
  const union = wordsA.size + wordsB.size - intersection;

  return intersection / union;
}

/**
 * Finds the reference entry sharing the most words with a text
 * @returns The best match, or undefined when no entry shares a word
 */
export function findBestReferenceMatch(
  text: string,
  reference: readonly SubtitleEntry[],
  scanLimit: number = REFERENCE_SCAN_LIMIT
): ReferenceMatch | undefined {
  const words = wordSet(text);
  let best: ReferenceMatch | undefined;

  for (const entry of reference.slice(0, scanLimit)) {
    const referenceText = stripMarkup(entry.text);
    let commonWords = 0;
    for (const word of wordSet(referenceText)) {
      if (words.has(word)) commonWords++;
    }

    if (commonWords > (best?.commonWords ?? 0)) {
      best = { text: referenceText, commonWords };
    }
  }

  return best;
}

export function similarityVerdict(averageSimilarity: number): SimilarityVerdict {
  if (averageSimilarity < 0.3) return 'low';
  if (averageSimilarity > 0.8) return 'high';
  return 'good';
}

/**
 * Lines up source and translated entries by position for review
 */
export function compareTranslations(options: CompareOptions): ComparisonReport {
  const { source, translated, reference } = options;
  const showSimilarity = options.showSimilarity ?? true;
  const limit = Math.min(options.maxEntries ?? 10, source.length, translated.length);

  const rows: ComparisonRow[] = [];
  for (let i = 0; i < limit; i++) {
    const sourceEntry = source[i];
    const translatedEntry = translated[i];
    if (!sourceEntry || !translatedEntry) break;

    const sourceText = stripMarkup(sourceEntry.text);
    const translatedText = stripMarkup(translatedEntry.text);

    rows.push({
      position: i + 1,
      index: sourceEntry.index,
      timing: sourceEntry.timing,
      sourceText,
      translatedText,
      similarity: calculateSimilarity(sourceText, translatedText),
      reference: reference ? findBestReferenceMatch(sourceText, reference) : undefined,
    });
  }

  const report: ComparisonReport = {
    sourceCount: source.length,
    translatedCount: translated.length,
    referenceCount: reference?.length,
    rows,
    showSimilarity,
  };

  if (showSimilarity && rows.length > 0) {
    const averageSimilarity = rows.reduce((sum, row) => sum + row.similarity, 0) / rows.length;
    report.averageSimilarity = averageSimilarity;
    report.verdict = similarityVerdict(averageSimilarity);
  }

  return report;
}

const VERDICT_MESSAGES: Record<SimilarityVerdict, string> = {
  low: '⚠️  Low similarity - translations may be too different from source',
  high: '⚠️  High similarity - translations may be too similar to source',
  good: '✅ Good similarity range',
};

function percent(ratio: number): string {
  return `${ratio.toFixed(2)} (${(ratio * 100).toFixed(1)}%)`;
}

/**
 * Renders a comparison report as console text
 */
export function formatComparisonReport(report: ComparisonReport): string {
  const lines: string[] = [
    '🔍 COMPARING TRANSLATIONS',
    '='.repeat(80),
    '📊 File Statistics:',
    `   Source: ${report.sourceCount} entries`,
    `   Translated: ${report.translatedCount} entries`,
    report.referenceCount === undefined
      ? '   Reference: Not provided'
      : `   Reference: ${report.referenceCount} entries`,
    '',
    `📋 Showing first ${report.rows.length} entries:`,
    '='.repeat(80),
  ];

  for (const row of report.rows) {
    lines.push('');
    lines.push(`🎬 Entry ${row.position} (Index: ${row.index})`);
    lines.push(`⏰ Timestamp: ${row.timing}`);
    lines.push(`📝 Source: ${row.sourceText}`);
    lines.push(`🔄 Translated: ${row.translatedText}`);
    if (report.showSimilarity) {
      lines.push(`📊 Similarity: ${percent(row.similarity)}`);
    }
    if (row.reference) {
      lines.push(`📖 Reference: ${row.reference.text}`);
      lines.push(`   (Similarity score: ${row.reference.commonWords} common words)`);
    }
    lines.push('-'.repeat(60));
  }

  if (report.averageSimilarity !== undefined && report.verdict) {
    lines.push('');
    lines.push('📈 SUMMARY STATISTICS:');
    lines.push(`   Average similarity: ${percent(report.averageSimilarity)}`);
    lines.push(`   Entries compared: ${report.rows.length}`);
    lines.push(`   ${VERDICT_MESSAGES[report.verdict]}`);
  }

  return lines.join('\n');
}
