import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  parseSrtContent,
  parseSrtContentWithReport,
  generateSrtContent,
  readSrtFile,
  writeSrtFile,
} from './srtParser';
import { SubtitleFileError } from '../errors';

describe('parseSrtContent', () => {
  it('should parse valid SRT content', () => {
    const srt = `1
00:00:01,000 --> 00:00:04,000
Hello world

2
00:00:05,000 --> 00:00:08,000
This is a test`;

    expect(parseSrtContent(srt)).toEqual([
      { index: 1, startMs: 1000, endMs: 4000, text: 'Hello world' },
      { index: 2, startMs: 5000, endMs: 8000, text: 'This is a test' },
    ]);
  });

  it('should keep multi-line text joined by newlines', () => {
    const srt = `1
00:00:01,000 --> 00:00:04,000
Line one
Line two`;

    expect(parseSrtContent(srt)[0]?.text).toBe('Line one\nLine two');
  });

  it('should handle Windows line endings and a byte order mark', () => {
    const srt = '\uFEFF1\r\n00:00:01,000 --> 00:00:02,500\r\nHello\r\n\r\n2\r\n00:00:03,000 --> 00:00:04,000\r\nAgain\r\n';

    expect(parseSrtContent(srt)).toEqual([
      { index: 1, startMs: 1000, endMs: 2500, text: 'Hello' },
      { index: 2, startMs: 3000, endMs: 4000, text: 'Again' },
    ]);
  });

  it('should keep indices as written, gaps included', () => {
    const srt = `7
00:00:01,000 --> 00:00:02,000
First

12
00:00:03,000 --> 00:00:04,000
Second`;

    expect(parseSrtContent(srt).map((e) => e.index)).toEqual([7, 12]);
  });

  it('should return an empty list for empty content', () => {
    expect(parseSrtContent('')).toEqual([]);
    expect(parseSrtContent('\n\n  \n')).toEqual([]);
  });
});

describe('parseSrtContentWithReport', () => {
  it('should skip malformed blocks and report them', () => {
    const srt = `1
00:00:01,000 --> 00:00:02,000
Good

abc
00:00:03,000 --> 00:00:04,000
Bad index

3
not a time line
Bad time

4
00:00:05,000 --> 00:00:06,000

5
00:00:07,000 --> 00:00:08,000
Also good`;

    const { entries, skipped } = parseSrtContentWithReport(srt);

    expect(entries.map((e) => e.index)).toEqual([1, 5]);
    expect(skipped).toEqual([
      { kind: 'skipped', block: 2, reason: 'invalid index "abc"' },
      { kind: 'skipped', block: 3, reason: 'invalid time line "not a time line"' },
      { kind: 'skipped', block: 4, reason: 'expected index, time line and text' },
    ]);
  });

  it('should skip captions that do not end after they start', () => {
    const srt =
      '1\n00:00:04,000 --> 00:00:02,000\nBackwards\n\n' +
      '2\n00:00:05,000 --> 00:00:05,000\nInstant\n\n' +
      '3\n00:00:06,000 --> 00:00:06,001\nShort\n';

    const { entries, skipped } = parseSrtContentWithReport(srt);

    expect(entries).toEqual([{ index: 3, startMs: 6000, endMs: 6001, text: 'Short' }]);
    expect(skipped).toEqual([
      { kind: 'skipped', block: 1, reason: 'end 00:00:02,000 is not after start 00:00:04,000' },
      { kind: 'skipped', block: 2, reason: 'end 00:00:05,000 is not after start 00:00:05,000' },
    ]);
  });
});

describe('generateSrtContent', () => {
  it('should generate valid SRT content', () => {
    const content = generateSrtContent([
      { index: 1, startMs: 1000, endMs: 4000, text: 'Hello' },
      { index: 2, startMs: 65500, endMs: 3723004, text: 'Two\nlines' },
    ]);

    expect(content).toBe(
      '1\n00:00:01,000 --> 00:00:04,000\nHello\n\n' +
        '2\n00:01:05,500 --> 01:02:03,004\nTwo\nlines\n\n'
    );
  });

  it('should reproduce well-formed input after parsing', () => {
    const original =
      '3\n00:00:01,250 --> 00:00:02,000\nFirst line\n\n' +
      '9\n00:10:00,000 --> 00:10:04,999\nSecond\nwith two lines\n\n';

    expect(generateSrtContent(parseSrtContent(original))).toBe(original);
  });

  it('should return an empty string for no entries', () => {
    expect(generateSrtContent([])).toBe('');
  });
});

describe('SRT files', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'srt-parser-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write and read back a file, creating missing directories', async () => {
    const filePath = path.join(tmpDir, 'nested', 'out.srt');
    const entries = [{ index: 1, startMs: 0, endMs: 1500, text: '你好' }];

    await writeSrtFile(filePath, entries);
    const report = await readSrtFile(filePath);

    expect(report.entries).toEqual(entries);
    expect(report.skipped).toEqual([]);
  });

  it('should throw SubtitleFileError for a missing file', async () => {
    const filePath = path.join(tmpDir, 'missing.srt');

    await expect(readSrtFile(filePath)).rejects.toThrow(SubtitleFileError);
    await expect(readSrtFile(filePath)).rejects.toThrow(`Subtitle file not found: ${filePath}`);
  });

  it('should throw SubtitleFileError for invalid UTF-8', async () => {
    const filePath = path.join(tmpDir, 'latin1.srt');
    fs.writeFileSync(filePath, Buffer.from([0x31, 0x0a, 0xff, 0xfe, 0x0a]));

    await expect(readSrtFile(filePath)).rejects.toThrow(`Subtitle file is not valid UTF-8: ${filePath}`);
  });
});
