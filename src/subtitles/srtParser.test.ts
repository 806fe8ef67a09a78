import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  DecodeError,
  decodeSubtitleBytes,
  parseSrtContent,
  parseSrt,
  generateSrtContent,
  serializeSrt,
  readSrtFile,
  writeSrtFile,
} from './srtParser';
import { SubtitleEntry } from './types';

describe('decodeSubtitleBytes', () => {
  it('should decode UTF-8 and drop the byte-order mark', () => {
    const raw = Buffer.from('\ufeff1\n00:00:01,000 --> 00:00:02,000\nHi\n', 'utf-8');
    const decoded = decodeSubtitleBytes(raw);

    expect(decoded.encoding).toBe('utf-8');
    expect(decoded.content).toBe('1\n00:00:01,000 --> 00:00:02,000\nHi\n');
  });

  it('should decode UTF-16 when a byte-order mark is present', () => {
    const srt = '1\n00:00:01,000 --> 00:00:02,000\nOlá\n';
    const raw = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(srt, 'utf16le')]);
    const decoded = decodeSubtitleBytes(raw);

    expect(decoded.encoding).toBe('utf-16');
    expect(decoded.content).toBe(srt);
  });

  it('should fall back to Latin-1 for legacy files', () => {
    const raw = Buffer.from('1\n00:00:01,000 --> 00:00:02,000\nCafé\n', 'latin1');
    const decoded = decodeSubtitleBytes(raw);

    expect(decoded.encoding).toBe('latin1');
    expect(decoded.content).toBe('1\n00:00:01,000 --> 00:00:02,000\nCafé\n');
  });

  it('should throw DecodeError when no encoding accepts the bytes', () => {
    const raw = Buffer.from([0xff, 0x41]);

    expect(() => decodeSubtitleBytes(raw, ['utf-8'])).toThrow(DecodeError);
    expect(() => decodeSubtitleBytes(raw, ['utf-8', 'utf-16'])).toThrow(
      'Could not decode subtitle content with any supported encoding (utf-8, utf-16)'
    );
  });
});

describe('parseSrtContent', () => {
  it('should parse valid SRT content', () => {
    const srt = `1
00:00:01,000 --> 00:00:04,000
Hello world

2
00:00:05,000 --> 00:00:08,000
This is a test`;

    const entries = parseSrtContent(srt);
    expect(entries).toHaveLength(2);

    expect(entries[0]).toEqual({
      index: 1,
      timing: '00:00:01,000 --> 00:00:04,000',
      text: 'Hello world',
    });

    expect(entries[1]).toEqual({
      index: 2,
      timing: '00:00:05,000 --> 00:00:08,000',
      text: 'This is a test',
    });
  });

  it('should handle multi-line subtitles', () => {
    const srt = `1
00:00:01,000 --> 00:00:04,000
Line one
Line two`;

    const entries = parseSrtContent(srt);
    expect(entries[0]?.text).toBe('Line one\nLine two');
  });

  it('should handle Windows line endings', () => {
    const srt = '1\r\n00:00:01,000 --> 00:00:04,000\r\nHello\r\n\r\n';
    const entries = parseSrtContent(srt);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.timing).toBe('00:00:01,000 --> 00:00:04,000');
    expect(entries[0]?.text).toBe('Hello');
  });

  it('should keep the timing line verbatim', () => {
    const srt = '4\n00:00:01.5 --> 00:00:04,000  X1:100 X2:200\nPositioned';
    const entries = parseSrtContent(srt);
    expect(entries[0]?.timing).toBe('00:00:01.5 --> 00:00:04,000  X1:100 X2:200');
  });

  it('should keep non-contiguous indices', () => {
    const srt = `5
00:00:01,000 --> 00:00:04,000
Hello

10
00:00:05,000 --> 00:00:08,000
World`;

    const entries = parseSrtContent(srt);
    expect(entries.map((entry) => entry.index)).toEqual([5, 10]);
  });

  it('should skip malformed blocks', () => {
    const srt = `1
00:00:01,000 --> 00:00:04,000
Hello

invalid block

abc
00:00:04,500 --> 00:00:04,900
Not numbered

3
00:00:09,000 --> 00:00:10,000

2
00:00:05,000 --> 00:00:08,000
World`;

    const entries = parseSrtContent(srt);
    expect(entries).toHaveLength(2);
    expect(entries.map((entry) => entry.text)).toEqual(['Hello', 'World']);
  });

  it('should skip indices that are too large to be integers', () => {
    const srt = '99999999999999999999\n00:00:01,000 --> 00:00:02,000\nOverflow';
    expect(parseSrtContent(srt)).toEqual([]);
  });

  it('should return no entries for empty or blank input', () => {
    expect(parseSrtContent('')).toEqual([]);
    expect(parseSrtContent('   \n\n  \n')).toEqual([]);
  });
});

describe('parseSrt', () => {
  it('should decode bytes before parsing', () => {
    const raw = Buffer.from('1\n00:00:01,000 --> 00:00:02,000\nÇa va\n', 'utf-8');
    expect(parseSrt(raw)).toEqual([{ index: 1, timing: '00:00:01,000 --> 00:00:02,000', text: 'Ça va' }]);
  });

  it('should parse empty bytes to an empty list', () => {
    expect(parseSrt(Buffer.alloc(0))).toEqual([]);
  });
});

describe('generateSrtContent', () => {
  it('should write each entry followed by one blank line', () => {
    const entries: SubtitleEntry[] = [
      { index: 1, timing: '00:00:01,000 --> 00:00:04,000', text: 'Hello' },
      { index: 2, timing: '00:00:05,000 --> 00:00:08,000', text: 'Line one\nLine two' },
    ];

    expect(generateSrtContent(entries)).toBe(
      '1\n00:00:01,000 --> 00:00:04,000\nHello\n\n' +
        '2\n00:00:05,000 --> 00:00:08,000\nLine one\nLine two\n\n'
    );
  });

  it('should not re-index entries', () => {
    const entries: SubtitleEntry[] = [
      { index: 5, timing: '00:00:01,000 --> 00:00:04,000', text: 'Hello' },
      { index: 10, timing: '00:00:05,000 --> 00:00:08,000', text: 'World' },
    ];

    const lines = generateSrtContent(entries).split('\n');
    expect(lines[0]).toBe('5');
    expect(lines[4]).toBe('10');
  });

  it('should produce nothing for no entries', () => {
    expect(generateSrtContent([])).toBe('');
  });
});

describe('serializeSrt', () => {
  it('should round-trip well-formed entries', () => {
    const entries: SubtitleEntry[] = [
      { index: 1, timing: '00:00:01,000 --> 00:00:04,000', text: 'Hello world' },
      { index: 2, timing: '00:00:05,000 --> 00:00:08,000', text: '<i>Line one</i>\nLine two' },
      { index: 7, timing: '00:00:09,000 --> 00:00:12,000', text: 'Ação à noite' },
    ];

    expect(parseSrt(serializeSrt(entries))).toEqual(entries);
  });

  it('should encode output as UTF-8', () => {
    const bytes = serializeSrt([{ index: 1, timing: '00:00:01,000 --> 00:00:02,000', text: 'é' }]);
    expect(bytes.toString('utf-8')).toBe('1\n00:00:01,000 --> 00:00:02,000\né\n\n');
  });
});

describe('readSrtFile / writeSrtFile', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'srt-parser-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write and read back the same entries', async () => {
    const filePath = path.join(tmpDir, 'out.srt');
    const entries: SubtitleEntry[] = [
      { index: 1, timing: '00:00:01,000 --> 00:00:04,000', text: 'Hello' },
      { index: 2, timing: '00:00:05,000 --> 00:00:08,000', text: 'World' },
    ];

    await writeSrtFile(filePath, entries);
    expect(await readSrtFile(filePath)).toEqual(entries);
  });

  it('should overwrite an existing file', async () => {
    const filePath = path.join(tmpDir, 'out.srt');
    fs.writeFileSync(filePath, 'previous content that is much longer than the new one');

    await writeSrtFile(filePath, [{ index: 1, timing: '00:00:01,000 --> 00:00:02,000', text: 'A' }]);
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('1\n00:00:01,000 --> 00:00:02,000\nA\n\n');
  });

  it('should return no entries for an empty file', async () => {
    const filePath = path.join(tmpDir, 'empty.srt');
    fs.writeFileSync(filePath, '');

    expect(await readSrtFile(filePath)).toEqual([]);
  });

  it('should reject when the file does not exist', async () => {
    await expect(readSrtFile(path.join(tmpDir, 'missing.srt'))).rejects.toThrow();
  });
});
