import { describe, it, expect } from 'vitest';
import {
  BatchTranslator,
  ensureTranslationCompleteness,
  formatBatchForTranslation,
  splitIntoBatches,
} from './batchTranslator';
import { TranslationProvider } from '../llm/types';
import { CaptionEntry } from '../subtitles/types';
import { PipelineCancelledError } from '../errors';

type Reply = string | Error | ((payload: string) => string);

/**
 * Replays scripted replies in order; the last one repeats once the script runs out
 */
class ScriptedProvider implements TranslationProvider {
  readonly type = 'openai' as const;
  readonly payloads: string[] = [];

  constructor(private replies: Reply[]) {}

  async translate(_systemPrompt: string, userPayload: string): Promise<string> {
    this.payloads.push(userPayload);
    const reply = this.replies[Math.min(this.payloads.length, this.replies.length) - 1];
    if (reply === undefined) throw new Error('No scripted reply');
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(userPayload) : reply;
  }

  async testConnection(): Promise<boolean> {
    return true;
  }
}

/**
 * Answers every numbered line with the line itself and a marker translation
 */
function echoTranslation(payload: string): string {
  return payload
    .split('\n')
    .map((line) => `${line}\n译文`)
    .join('\n');
}

function captions(...texts: string[]): CaptionEntry[] {
  return texts.map((text, i) => ({ index: i + 1, startMs: i * 1000, endMs: i * 1000 + 900, text }));
}

describe('splitIntoBatches', () => {
  it('should split into fixed-size batches with offsets', () => {
    const batches = splitIntoBatches(captions('a', 'b', 'c', 'd', 'e'), 2);

    expect(batches.map((b) => b.offset)).toEqual([0, 2, 4]);
    expect(batches.map((b) => b.entries.length)).toEqual([2, 2, 1]);
  });

  it('should return no batches for no captions', () => {
    expect(splitIntoBatches([], 10)).toEqual([]);
  });

  it('should reject a batch size below one', () => {
    expect(() => splitIntoBatches(captions('a'), 0)).toThrow(RangeError);
  });
});

describe('formatBatchForTranslation', () => {
  it('should number captions by global position and flatten line breaks', () => {
    const batch = { offset: 10, entries: captions('First line\n  second line', 'Next') };

    expect(formatBatchForTranslation(batch)).toBe('11: First line second line\n12: Next');
  });
});

describe('ensureTranslationCompleteness', () => {
  it('should fill gaps with the original text', () => {
    const batch = { offset: 3, entries: captions('d', 'e', 'f') };
    const translations = new Map([
      [4, 'd\n丁'],
      [6, 'f\n己'],
    ]);

    expect(ensureTranslationCompleteness(translations, batch)).toEqual({
      texts: ['d\n丁', 'e', 'f\n己'],
      filled: [{ kind: 'filled', sequence: 5, original: 'e' }],
    });
  });
});

describe('BatchTranslator', () => {
  it('should stop after the first complete, well-formed response', async () => {
    const provider = new ScriptedProvider([echoTranslation]);
    const translator = new BatchTranslator({ provider, systemPrompt: 'prompt' });

    const result = await translator.translateAll(captions('Hello', 'World'));

    expect(provider.payloads).toEqual(['1: Hello\n2: World']);
    expect(result.texts).toEqual(['Hello\n译文', 'World\n译文']);
    expect(result.filled).toEqual([]);
    expect(result.stats).toEqual({ batches: 1, attempts: 1, translated: 2, filled: 0 });
  });

  it('should fall back to the original text for captions never returned', async () => {
    const partial = '1: One\n一\n3: Three\n三\n5: Five\n五';
    const provider = new ScriptedProvider([partial]);
    const translator = new BatchTranslator({ provider, systemPrompt: 'prompt', maxAttempts: 5 });

    const result = await translator.translateAll(captions('One', 'Two', 'Three', 'Four', 'Five'));

    expect(provider.payloads).toHaveLength(5);
    expect(result.texts).toEqual(['One\n一', 'Two', 'Three\n三', 'Four', 'Five\n五']);
    expect(result.filled.map((f) => f.sequence)).toEqual([2, 4]);
    expect(result.stats).toEqual({ batches: 1, attempts: 5, translated: 3, filled: 2 });
  });

  it('should count failed requests as attempts', async () => {
    const provider = new ScriptedProvider([new Error('timeout'), new Error('rate limited'), echoTranslation]);
    const translator = new BatchTranslator({ provider, systemPrompt: 'prompt', maxAttempts: 3 });

    const result = await translator.translateBatch({ offset: 0, entries: captions('Hi') });

    expect(result.attempts).toBe(3);
    expect(result.texts).toEqual(['Hi\n译文']);
  });

  it('should keep original texts when every attempt fails', async () => {
    const provider = new ScriptedProvider([new Error('down')]);
    const translator = new BatchTranslator({ provider, systemPrompt: 'prompt', maxAttempts: 2 });

    const result = await translator.translateAll(captions('Hi', 'There'));

    expect(provider.payloads).toHaveLength(2);
    expect(result.texts).toEqual(['Hi', 'There']);
    expect(result.stats.filled).toBe(2);
  });

  it('should keep the attempt that covered the most captions', async () => {
    const provider = new ScriptedProvider([
      '1: a\n甲',
      '1: a\n2: b\n乙',
      '2: b\n乙',
    ]);
    const translator = new BatchTranslator({ provider, systemPrompt: 'prompt', maxAttempts: 3 });

    const result = await translator.translateBatch({ offset: 0, entries: captions('a', 'b', 'c') });

    // The second reply is malformed but covers two captions, so it wins
    expect(result.texts).toEqual(['a', 'b\n乙', 'c']);
    expect(result.filled).toEqual([{ kind: 'filled', sequence: 3, original: 'c' }]);
  });

  it('should prefer a well-formed attempt over a malformed one of the same size', async () => {
    const provider = new ScriptedProvider(['1: a\n2: b', '1: a\n甲\n2: b\n乙']);
    const translator = new BatchTranslator({ provider, systemPrompt: 'prompt', maxAttempts: 2 });

    const result = await translator.translateBatch({ offset: 0, entries: captions('a', 'b', 'c') });

    expect(result.texts).toEqual(['a\n甲', 'b\n乙', 'c']);
    expect(result.attempts).toBe(2);
  });

  it('should ignore sequence numbers outside the batch', async () => {
    const provider = new ScriptedProvider(['3: c\n丙\n9: stray\n杂']);
    const translator = new BatchTranslator({ provider, systemPrompt: 'prompt', maxAttempts: 1 });

    const result = await translator.translateBatch({ offset: 2, entries: captions('c', 'd') });

    expect(result.texts).toEqual(['c\n丙', 'd']);
  });

  it('should number later batches after earlier ones', async () => {
    const provider = new ScriptedProvider([echoTranslation]);
    const progress: number[] = [];
    const translator = new BatchTranslator({
      provider,
      systemPrompt: 'prompt',
      batchSize: 2,
      onProgress: (p) => {
        progress.push(p.resolved);
      },
    });

    const result = await translator.translateAll(captions('a', 'b', 'c'));

    expect(provider.payloads).toEqual(['1: a\n2: b', '3: c']);
    expect(result.texts).toEqual(['a\n译文', 'b\n译文', 'c\n译文']);
    expect(progress).toEqual([2, 3]);
  });

  it('should stop before the next batch once cancelled', async () => {
    const provider = new ScriptedProvider([echoTranslation]);
    const controller = new AbortController();
    const translator = new BatchTranslator({
      provider,
      systemPrompt: 'prompt',
      batchSize: 1,
      signal: controller.signal,
      onProgress: () => controller.abort(),
    });

    const run = translator.translateAll(captions('a', 'b'));

    await expect(run).rejects.toThrow(PipelineCancelledError);
    await expect(run).rejects.toThrow('Translation cancelled after 1 batch(es)');
    expect(provider.payloads).toEqual(['1: a']);
  });

  it('should reject a non-positive attempt budget', () => {
    const provider = new ScriptedProvider([echoTranslation]);

    expect(() => new BatchTranslator({ provider, systemPrompt: 'prompt', maxAttempts: 0 })).toThrow(RangeError);
  });
});
