import { describe, it, expect } from 'vitest';
import { containsCjk, splitByScript, rebuildCaptions, mergeBilingualCaptions } from './bilingual';
import { CaptionEntry } from './types';

function caption(index: number, text: string): CaptionEntry {
  return { index, startMs: index * 1000, endMs: index * 1000 + 800, text };
}

describe('containsCjk', () => {
  it('should detect CJK ideographs anywhere in a line', () => {
    expect(containsCjk('Hello 世界')).toBe(true);
    expect(containsCjk('Hello world')).toBe(false);
  });
});

describe('splitByScript', () => {
  it('should group lines by script and drop blank lines', () => {
    expect(splitByScript('Hello\n你好\n\n  World  \n世界')).toEqual({
      target: ['你好', '世界'],
      source: ['Hello', 'World'],
    });
  });
});

describe('rebuildCaptions', () => {
  it('should keep timing and index while replacing text', () => {
    const rebuilt = rebuildCaptions([caption(4, 'Hi'), caption(9, 'Bye')], ['Hi\n嗨', 'Bye\n再见']);

    expect(rebuilt).toEqual([
      { index: 4, startMs: 4000, endMs: 4800, text: 'Hi\n嗨' },
      { index: 9, startMs: 9000, endMs: 9800, text: 'Bye\n再见' },
    ]);
  });

  it('should keep original text when texts run short', () => {
    const rebuilt = rebuildCaptions([caption(1, 'One'), caption(2, 'Two')], ['One\n一']);

    expect(rebuilt.map((e) => e.text)).toEqual(['One\n一', 'Two']);
  });
});

describe('mergeBilingualCaptions', () => {
  it('should join two streams sharing indices', () => {
    const merged = mergeBilingualCaptions(
      [caption(1, 'Hello'), caption(2, 'How are you'), caption(3, 'Goodbye')],
      [caption(1, '你好'), caption(2, '你好吗'), caption(3, '再见')]
    );

    expect(merged).toEqual([
      { index: 1, startMs: 1000, endMs: 1800, text: 'Hello\n你好' },
      { index: 2, startMs: 2000, endMs: 2800, text: 'How are you\n你好吗' },
      { index: 3, startMs: 3000, endMs: 3800, text: 'Goodbye\n再见' },
    ]);
  });

  it('should keep the first text alone when the index is missing', () => {
    const merged = mergeBilingualCaptions([caption(1, 'Hello'), caption(2, 'Alone')], [caption(1, '你好')]);

    expect(merged.map((e) => e.text)).toEqual(['Hello\n你好', 'Alone']);
  });

  it('should use the first matching entry for a repeated index', () => {
    const merged = mergeBilingualCaptions([caption(1, 'Hello')], [caption(1, '第一'), caption(1, '第二')]);

    expect(merged[0]?.text).toBe('Hello\n第一');
  });

  it('should keep the timing of the first stream', () => {
    const shifted = { index: 1, startMs: 50, endMs: 60, text: '你好' };
    const merged = mergeBilingualCaptions([caption(1, 'Hello')], [shifted]);

    expect(merged[0]).toEqual({ index: 1, startMs: 1000, endMs: 1800, text: 'Hello\n你好' });
  });
});
