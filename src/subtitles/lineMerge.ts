import { CaptionEntry } from './types';

export const DEFAULT_CJK_THRESHOLD = 20;

const CJK_IDEOGRAPH = /[\u4e00-\u9fff]/g;

/**
 * Counts characters in the CJK Unified Ideographs block (U+4E00–U+9FFF)
 */
export function countCjkCharacters(text: string): number {
  return text.match(CJK_IDEOGRAPH)?.length ?? 0;
}

export interface LineMergeOptions {
  /** A caption with more CJK characters than this is never merged with the next one */
  cjkThreshold?: number;
}

/**
 * Merges adjacent captions pairwise to reduce on-screen churn.
 *
 * The first caption of a pair is emitted alone when it is already dense in CJK text.
 * Merged captions span from the first start to the second end, texts joined by a space.
 * Output indices are renumbered from 1.
 */
export function mergeCaptionLines(
  entries: readonly CaptionEntry[],
  options: LineMergeOptions = {}
): CaptionEntry[] {
  const threshold = options.cjkThreshold ?? DEFAULT_CJK_THRESHOLD;
  const merged: Array<Omit<CaptionEntry, 'index'>> = [];

  let i = 0;
  while (i < entries.length) {
    const first = entries[i];
    if (!first) break;
    const second = entries[i + 1];

    if (!second || countCjkCharacters(first.text) > threshold) {
      merged.push({ startMs: first.startMs, endMs: first.endMs, text: first.text });
      i += 1;
      continue;
    }

    merged.push({
      startMs: first.startMs,
      endMs: second.endMs,
      text: `${first.text} ${second.text}`,
    });
    i += 2;
  }

  return merged.map((entry, position) => ({ index: position + 1, ...entry }));
}
