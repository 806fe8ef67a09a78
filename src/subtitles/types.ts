/**
 * Represents a single subtitle entry parsed from an SRT file
 */
export interface SubtitleEntry {
  /** Display order from the SRT file (not necessarily contiguous) */
  readonly index: number;
  /** Timestamp range line, kept exactly as it appeared in the source */
  readonly timing: string;
  /** The subtitle text content, lines joined with "\n" */
  readonly text: string;
}

/**
 * Text encodings tried, in order, when decoding a subtitle file
 */
export type SubtitleEncoding = 'utf-8' | 'utf-16' | 'latin1';

/**
 * Result of decoding raw subtitle bytes
 */
export interface DecodedSubtitle {
  content: string;
  encoding: SubtitleEncoding;
}
