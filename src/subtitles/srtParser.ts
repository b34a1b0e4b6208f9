import fs from 'fs';
import path from 'path';
import { CaptionEntry, ParseReport, SkippedOutcome } from './types';
import { millisToTimestamp, timestampToMillis } from './timing';
import { SubtitleFileError } from '../errors';

const TIME_LINE_PATTERN =
  /^(\d+:\d{2}:\d{2}[,.]\d{1,3})\s*-->\s*(\d+:\d{2}:\d{2}[,.]\d{1,3})/;

/**
 * Parses an SRT document and reports every block that had to be dropped.
 * A caption must end after it starts; zero-length and reversed ones are skipped.
 * @param content - The raw SRT file content
 * @returns Parsed entries in file order plus the skipped blocks
 */
export function parseSrtContentWithReport(content: string): ParseReport {
  const entries: CaptionEntry[] = [];
  const skipped: SkippedOutcome[] = [];

  // Normalize BOM and line endings, then split into blocks
  const normalizedContent = content
    .replace(/^\uFEFF/, '')
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n');
  const blocks = normalizedContent.split(/\n[ \t]*\n/).filter((block) => block.trim());

  blocks.forEach((block, blockNumber) => {
    const lines = block.split('\n').filter((line) => line.trim());
    const skip = (reason: string): void => {
      skipped.push({ kind: 'skipped', block: blockNumber + 1, reason });
    };

    if (lines.length < 3) {
      skip('expected index, time line and text');
      return;
    }

    // First line should be the index number
    const indexLine = (lines[0] ?? '').trim();
    if (!/^\d+$/.test(indexLine)) {
      skip(`invalid index "${indexLine}"`);
      return;
    }

    // Second line should be the timestamp
    const timeMatch = TIME_LINE_PATTERN.exec((lines[1] ?? '').trim());
    if (!timeMatch?.[1] || !timeMatch[2]) {
      skip(`invalid time line "${lines[1] ?? ''}"`);
      return;
    }

    const startMs = timestampToMillis(timeMatch[1]);
    const endMs = timestampToMillis(timeMatch[2]);
    if (endMs <= startMs) {
      skip(`end ${timeMatch[2]} is not after start ${timeMatch[1]}`);
      return;
    }

    entries.push({
      index: parseInt(indexLine, 10),
      startMs,
      endMs,
      text: lines.slice(2).join('\n').trim(),
    });
  });

  return { entries, skipped };
}

/**
 * Parses SRT file content into caption entries. Malformed blocks are dropped.
 */
export function parseSrtContent(content: string): CaptionEntry[] {
  return parseSrtContentWithReport(content).entries;
}

/**
 * Generates SRT content from caption entries
 * Indices are written as stored; every block ends with a blank line.
 */
export function generateSrtContent(entries: readonly CaptionEntry[]): string {
  return entries
    .map((entry) => {
      const start = millisToTimestamp(entry.startMs);
      const end = millisToTimestamp(entry.endMs);
      return `${entry.index}\n${start} --> ${end}\n${entry.text}\n\n`;
    })
    .join('');
}

/**
 * Reads a whole file as strict UTF-8
 * @throws SubtitleFileError when the file is missing or not valid UTF-8
 */
export async function readTextFile(filePath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await fs.promises.readFile(filePath);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    throw new SubtitleFileError(
      filePath,
      code === 'ENOENT' ? 'Subtitle file not found' : 'Subtitle file could not be read'
    );
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    throw new SubtitleFileError(filePath, 'Subtitle file is not valid UTF-8');
  }
}

/**
 * Reads and parses an SRT file
 */
export async function readSrtFile(filePath: string): Promise<ParseReport> {
  const content = await readTextFile(filePath);
  return parseSrtContentWithReport(content);
}

/**
 * Writes caption entries to an SRT file, creating the parent directory if needed
 */
export async function writeSrtFile(filePath: string, entries: readonly CaptionEntry[]): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, generateSrtContent(entries), 'utf-8');
}
