import { SubtitleEntry } from './types';
import { logger } from '../utils/logger';

export const DEFAULT_GUIDE_MAX_ENTRIES = 100;
export const DEFAULT_CONTEXT_RADIUS = 20;

/**
 * Removes tag-like markup (e.g. <i>, <font color="...">) and surrounding whitespace
 */
export function stripMarkup(text: string): string {
  return text.replace(/<[^>]+>/g, '').trim();
}

/**
 * Builds the run-wide style reference from the reference (target language) subtitles.
 * The same guide is handed to every prompt in a run.
 * @param referenceEntries - Subtitles in the target language
 * @param maxEntries - How many leading entries to sample
 * @returns One stripped subtitle text per line
 */
export function buildGlobalGuide(
  referenceEntries: readonly SubtitleEntry[],
  maxEntries: number = DEFAULT_GUIDE_MAX_ENTRIES
): string {
  if (referenceEntries.length === 0) {
    logger.warn('No context subtitles found');
    return '';
  }

  const texts = referenceEntries
    .slice(0, Math.max(0, maxEntries))
    .map((entry) => stripMarkup(entry.text))
    .filter((text) => text);

  logger.info(`Extracted ${texts.length} context text entries`);
  return texts.join('\n');
}

/**
 * Formats the label used for a neighbour of the entry being translated
 */
export function formatWindowLabel(position: number, centerIndex: number): string {
  if (position < centerIndex) return `Previous ${centerIndex - position}`;
  if (position > centerIndex) return `Next ${position - centerIndex}`;
  return 'Current';
}

/**
 * Builds the labelled reference lines surrounding one position in the reference subtitles.
 * Out-of-range centres are clamped, never rejected; entries with no text after
 * stripping are left out.
 * @param referenceEntries - Subtitles in the target language
 * @param centerIndex - Zero-based position of the entry being translated
 * @param radius - Number of neighbours on each side
 * @returns Lines like "[Previous 1]: ...", "[Current]: ...", "[Next 1]: ..."
 */
export function buildLocalWindow(
  referenceEntries: readonly SubtitleEntry[],
  centerIndex: number,
  radius: number = DEFAULT_CONTEXT_RADIUS
): string {
  if (referenceEntries.length === 0) {
    logger.warn('No context subtitles found');
    return '';
  }

  const start = Math.max(0, centerIndex - radius);
  const end = Math.min(referenceEntries.length, centerIndex + radius + 1);

  const lines: string[] = [];
  for (let i = start; i < end; i++) {
    const entry = referenceEntries[i];
    if (!entry) continue;

    const text = stripMarkup(entry.text);
    if (!text) continue;

    lines.push(`[${formatWindowLabel(i, centerIndex)}]: ${text}`);
  }

  logger.debug(`Extracted contextual guide for index ${centerIndex}: ${lines.length} entries`);
  return lines.join('\n');
}
