import fs from 'fs';
import { DecodedSubtitle, SubtitleEncoding, SubtitleEntry } from './types';
import { logger } from '../utils/logger';

export const SUPPORTED_ENCODINGS: readonly SubtitleEncoding[] = ['utf-8', 'utf-16', 'latin1'];

/**
 * Raised when none of the supported encodings can decode a subtitle file
 */
export class DecodeError extends Error {
  constructor(
    message: string,
    readonly triedEncodings: readonly SubtitleEncoding[]
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

/**
 * Decodes bytes with a single encoding, returning null when the bytes are not valid for it.
 * UTF-16 is only accepted with a byte-order mark, since almost any even-length
 * byte sequence would otherwise decode as (garbage) UTF-16.
 */
function tryDecode(raw: Uint8Array, encoding: SubtitleEncoding): string | null {
  let label: string = encoding;

  if (encoding === 'utf-16') {
    if (raw.length >= 2 && raw[0] === 0xff && raw[1] === 0xfe) {
      label = 'utf-16le';
    } else if (raw.length >= 2 && raw[0] === 0xfe && raw[1] === 0xff) {
      label = 'utf-16be';
    } else {
      return null;
    }
  }

  try {
    return new TextDecoder(label, { fatal: true }).decode(raw);
  } catch {
    return null;
  }
}

/**
 * Decodes raw subtitle bytes with the first encoding that accepts them
 * @param raw - File contents
 * @param encodings - Encodings to try, in order
 * @throws DecodeError if no encoding accepts the bytes
 */
export function decodeSubtitleBytes(
  raw: Uint8Array,
  encodings: readonly SubtitleEncoding[] = SUPPORTED_ENCODINGS
): DecodedSubtitle {
  for (const encoding of encodings) {
    const content = tryDecode(raw, encoding);
    if (content !== null) {
      logger.debug(`Decoded subtitle content as ${encoding}`);
      return { content, encoding };
    }
  }

  throw new DecodeError(
    `Could not decode subtitle content with any supported encoding (${encodings.join(', ')})`,
    encodings
  );
}

/**
 * Parses SRT text into subtitle entries.
 * Blocks without an all-digit first line, or with fewer than three lines, are skipped.
 * @param content - The decoded SRT file content
 * @returns Entries in file order
 */
export function parseSrtContent(content: string): SubtitleEntry[] {
  const entries: SubtitleEntry[] = [];

  // Normalize line endings and split into blocks
  const normalizedContent = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  if (!normalizedContent.trim()) {
    return entries;
  }

  const blocks = normalizedContent
    .split(/\n[ \t]*\n/)
    .map((block) => block.trim())
    .filter((block) => block);

  for (const block of blocks) {
    const lines = block.split('\n');
    const [indexLine, timing] = lines;

    if (lines.length < 3 || indexLine === undefined || timing === undefined) {
      logger.debug(`Skipping block with fewer than 3 lines: ${block.slice(0, 100)}`);
      continue;
    }

    if (!/^\d+$/.test(indexLine)) {
      logger.debug(`Skipping block that doesn't start with a number: ${indexLine}`);
      continue;
    }

    const index = Number.parseInt(indexLine, 10);
    if (!Number.isSafeInteger(index)) {
      logger.warn(`Skipping malformed subtitle block: ${block.slice(0, 100)}`);
      continue;
    }

    entries.push({
      index,
      timing,
      text: lines.slice(2).join('\n'),
    });
  }

  return entries;
}

/**
 * Decodes and parses an SRT document
 * @param raw - Raw bytes, or already-decoded text
 */
export function parseSrt(
  raw: Uint8Array | string,
  encodings: readonly SubtitleEncoding[] = SUPPORTED_ENCODINGS
): SubtitleEntry[] {
  const content = typeof raw === 'string' ? raw : decodeSubtitleBytes(raw, encodings).content;
  return parseSrtContent(content);
}

/**
 * Generates SRT content from subtitle entries.
 * Indices and timings are written as they are; nothing is re-numbered or re-sorted.
 */
export function generateSrtContent(entries: readonly SubtitleEntry[]): string {
  return entries.map((entry) => `${entry.index}\n${entry.timing}\n${entry.text}\n\n`).join('');
}

/**
 * Serializes entries to UTF-8 SRT bytes
 */
export function serializeSrt(entries: readonly SubtitleEntry[]): Buffer {
  return Buffer.from(generateSrtContent(entries), 'utf-8');
}

/**
 * Reads and parses an SRT file
 * @throws DecodeError if the file cannot be decoded
 */
export async function readSrtFile(filePath: string): Promise<SubtitleEntry[]> {
  const raw = await fs.promises.readFile(filePath);

  const { content } = decodeSubtitleBytes(raw);
  if (!content.trim()) {
    logger.error(`File ${filePath} appears to be empty`);
    return [];
  }

  const entries = parseSrtContent(content);
  logger.info(`Loaded ${entries.length} subtitle entries from ${filePath}`);
  return entries;
}

/**
 * Writes entries to an SRT file, replacing any existing content
 */
export async function writeSrtFile(filePath: string, entries: readonly SubtitleEntry[]): Promise<void> {
  await fs.promises.writeFile(filePath, serializeSrt(entries));
  logger.info(`Wrote ${entries.length} subtitle entries to ${filePath}`);
}
