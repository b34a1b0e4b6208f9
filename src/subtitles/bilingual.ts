import { CaptionEntry, ScriptGroups } from './types';

const CJK_IDEOGRAPH = /[\u4e00-\u9fff]/;

/**
 * True when the line contains at least one CJK ideograph
 */
export function containsCjk(line: string): boolean {
  return CJK_IDEOGRAPH.test(line);
}

/**
 * Splits a caption's lines into target-language (CJK) and source-language groups,
 * keeping the original order within each group. Blank lines are dropped.
 */
export function splitByScript(text: string): ScriptGroups {
  const groups: ScriptGroups = { target: [], source: [] };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;
    (containsCjk(line) ? groups.target : groups.source).push(line);
  }

  return groups;
}

/**
 * Pairs each caption's index and timing with a replacement text.
 * Captions past the end of `texts` keep their original text.
 */
export function rebuildCaptions(
  entries: readonly CaptionEntry[],
  texts: readonly string[]
): CaptionEntry[] {
  return entries.map((entry, i) => ({
    index: entry.index,
    startMs: entry.startMs,
    endMs: entry.endMs,
    text: texts[i] ?? entry.text,
  }));
}

/**
 * Joins two independently produced caption streams by index.
 * Every caption of `first` is kept with its timing; the text of the `second`
 * caption with the same index is appended on a new line when one exists.
 */
export function mergeBilingualCaptions(
  first: readonly CaptionEntry[],
  second: readonly CaptionEntry[]
): CaptionEntry[] {
  const secondByIndex = new Map<number, string>();
  for (const entry of second) {
    // First occurrence wins
    if (!secondByIndex.has(entry.index)) {
      secondByIndex.set(entry.index, entry.text);
    }
  }

  return first.map((entry) => {
    const translated = secondByIndex.get(entry.index);
    return {
      ...entry,
      text: translated ? `${entry.text}\n${translated}` : entry.text,
    };
  });
}
