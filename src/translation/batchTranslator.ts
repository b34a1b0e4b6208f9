import { CaptionEntry, FilledOutcome } from '../subtitles/types';
import { TranslationProvider } from '../llm/types';
import { PipelineCancelledError, errorMessage } from '../errors';
import { parseBilingualResult } from './resultParser';
import {
  BatchProgress,
  BatchResult,
  TranslationBatch,
  TranslationMap,
  TranslationRunResult,
} from './types';

export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_MAX_ATTEMPTS = 5;

export interface BatchTranslatorOptions {
  provider: TranslationProvider;
  systemPrompt: string;
  batchSize?: number;
  /** Requests per batch, the first one included */
  maxAttempts?: number;
  onProgress?: (progress: BatchProgress) => void | Promise<void>;
  /** Checked between batches; a batch in flight always runs to the end */
  signal?: AbortSignal;
}

/**
 * Splits captions into fixed-size batches carrying their offset in the stream
 */
export function splitIntoBatches(
  entries: readonly CaptionEntry[],
  batchSize: number = DEFAULT_BATCH_SIZE
): TranslationBatch[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const batches: TranslationBatch[] = [];
  for (let offset = 0; offset < entries.length; offset += batchSize) {
    batches.push({ offset, entries: entries.slice(offset, offset + batchSize) });
  }
  return batches;
}

/**
 * Global sequence numbers covered by a batch
 */
export function batchSequenceNumbers(batch: TranslationBatch): number[] {
  return batch.entries.map((_, i) => batch.offset + i + 1);
}

/**
 * Formats a batch as "<seq>: <text>" lines, one caption per line
 */
export function formatBatchForTranslation(batch: TranslationBatch): string {
  return batch.entries
    .map((entry, i) => `${batch.offset + i + 1}: ${entry.text.replace(/\s*\n\s*/g, ' ')}`)
    .join('\n');
}

/**
 * Resolves a batch to one text per caption, using the original text where the map has a gap
 */
export function ensureTranslationCompleteness(
  translations: TranslationMap,
  batch: TranslationBatch
): { texts: string[]; filled: FilledOutcome[] } {
  const texts: string[] = [];
  const filled: FilledOutcome[] = [];

  batch.entries.forEach((entry, i) => {
    const sequence = batch.offset + i + 1;
    const translated = translations.get(sequence);
    if (translated !== undefined) {
      texts.push(translated);
    } else {
      texts.push(entry.text);
      filled.push({ kind: 'filled', sequence, original: entry.text });
    }
  });

  return { texts, filled };
}

/**
 * Drives the translation provider batch by batch, retrying incomplete or malformed
 * responses and falling back to the original text when the attempts run out.
 *
 * Batches are sent strictly one after another; the provider is treated as single-flight.
 */
export class BatchTranslator {
  private provider: TranslationProvider;
  private systemPrompt: string;
  private batchSize: number;
  private maxAttempts: number;
  private onProgress?: (progress: BatchProgress) => void | Promise<void>;
  private signal?: AbortSignal;

  constructor(options: BatchTranslatorOptions) {
    this.provider = options.provider;
    this.systemPrompt = options.systemPrompt;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.onProgress = options.onProgress;
    this.signal = options.signal;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
  }

  /**
   * Translates every caption. Always returns exactly one text per caption.
   * @throws PipelineCancelledError when the signal is aborted before a batch starts
   */
  async translateAll(entries: readonly CaptionEntry[]): Promise<TranslationRunResult> {
    const batches = splitIntoBatches(entries, this.batchSize);
    const texts: string[] = [];
    const filled: FilledOutcome[] = [];
    let attempts = 0;

    for (const [i, batch] of batches.entries()) {
      if (this.signal?.aborted) {
        throw new PipelineCancelledError(i);
      }

      const result = await this.translateBatch(batch, i + 1, batches.length);
      texts.push(...result.texts);
      filled.push(...result.filled);
      attempts += result.attempts;

      await this.onProgress?.({
        batchNumber: i + 1,
        totalBatches: batches.length,
        resolved: texts.length,
        total: entries.length,
      });
    }

    // Per-batch resolution already yields one text per caption; this only guards the total
    if (texts.length !== entries.length) {
      console.warn(
        `Translated text count ${texts.length} does not match caption count ${entries.length}, reconciling`
      );
      texts.length = Math.min(texts.length, entries.length);
      for (let i = texts.length; i < entries.length; i++) {
        const original = entries[i]?.text ?? '';
        texts.push(original);
        filled.push({ kind: 'filled', sequence: i + 1, original });
      }
    }

    return {
      texts,
      filled,
      stats: {
        batches: batches.length,
        attempts,
        translated: entries.length - filled.length,
        filled: filled.length,
      },
    };
  }

  /**
   * Translates one batch with up to `maxAttempts` requests.
   *
   * The best map is replaced when an attempt covers more captions. An attempt that covers
   * the same number also replaces it when its response is well-formed and the best one's
   * was not, so paired source/target text wins over bare source lines. Retrying stops
   * early once an attempt is both complete and well-formed.
   */
  async translateBatch(
    batch: TranslationBatch,
    batchNumber: number = 1,
    totalBatches: number = 1
  ): Promise<BatchResult> {
    const expected = batchSequenceNumbers(batch);
    const payload = formatBatchForTranslation(batch);
    const label = `Batch ${batchNumber}/${totalBatches}`;

    let best: TranslationMap = new Map();
    let bestValid = false;
    let attempts = 0;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      attempts = attempt;

      let response: string;
      try {
        response = await this.provider.translate(this.systemPrompt, payload);
      } catch (error) {
        console.warn(`${label} attempt ${attempt}/${this.maxAttempts} failed: ${errorMessage(error)}`);
        continue;
      }

      const parsed = parseBilingualResult(response);
      const relevant: TranslationMap = new Map();
      for (const sequence of expected) {
        const unit = parsed.translations.get(sequence);
        if (unit !== undefined) relevant.set(sequence, unit);
      }

      if (relevant.size > best.size || (relevant.size === best.size && parsed.formatValid && !bestValid)) {
        best = relevant;
        bestValid = parsed.formatValid;
      }

      if (relevant.size === expected.length && parsed.formatValid) {
        break;
      }

      console.warn(
        `${label} attempt ${attempt}/${this.maxAttempts} incomplete: ` +
          `${relevant.size}/${expected.length} captions, format ${parsed.formatValid ? 'valid' : 'invalid'}`
      );
    }

    const { texts, filled } = ensureTranslationCompleteness(best, batch);

    if (filled.length > 0) {
      console.warn(
        `${label}: ${filled.length} caption(s) left untranslated after ${attempts} attempt(s): ` +
          filled.map((f) => f.sequence).join(', ')
      );
    } else {
      console.info(`${label} translated in ${attempts} attempt(s)`);
    }

    return { batch, texts, filled, attempts };
  }
}
