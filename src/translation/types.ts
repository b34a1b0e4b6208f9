import { CaptionEntry, FilledOutcome } from '../subtitles/types';

/**
 * A contiguous slice of the caption stream sent to the translator as one request
 */
export interface TranslationBatch {
  /** Number of captions before this batch in the whole stream */
  offset: number;
  entries: readonly CaptionEntry[];
}

/**
 * Global sequence number (1-based position in the whole stream) → translated unit.
 * A unit is either one line or "source\ntarget".
 */
export type TranslationMap = Map<number, string>;

export interface ParsedTranslation {
  translations: TranslationMap;
  /** False when any unit was missing its second half, or nothing was found */
  formatValid: boolean;
}

export interface BatchProgress {
  batchNumber: number;
  totalBatches: number;
  /** Captions resolved so far, translated or filled */
  resolved: number;
  total: number;
}

export interface BatchResult {
  batch: TranslationBatch;
  /** One text per caption of the batch, in order */
  texts: string[];
  filled: FilledOutcome[];
  attempts: number;
}

export interface TranslationStats {
  batches: number;
  attempts: number;
  translated: number;
  filled: number;
}

export interface TranslationRunResult {
  /** One text per input caption, in order */
  texts: string[];
  filled: FilledOutcome[];
  stats: TranslationStats;
}
