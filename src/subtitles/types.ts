/**
 * A single caption parsed from an SRT file
 */
export interface CaptionEntry {
  /** Ordinal from the source file (1-based, not necessarily contiguous) */
  index: number;
  /** Start time in milliseconds */
  startMs: number;
  /** End time in milliseconds */
  endMs: number;
  /** Display lines joined by "\n" */
  text: string;
}

/**
 * Non-fatal result reported by a pipeline stage instead of throwing
 */
export type Outcome =
  | { kind: 'ok' }
  | { kind: 'skipped'; block: number; reason: string }
  | { kind: 'filled'; sequence: number; original: string };

export type SkippedOutcome = Extract<Outcome, { kind: 'skipped' }>;
export type FilledOutcome = Extract<Outcome, { kind: 'filled' }>;

/**
 * Result of parsing an SRT document with the dropped blocks reported
 */
export interface ParseReport {
  entries: CaptionEntry[];
  skipped: SkippedOutcome[];
}

/**
 * Lines of a bilingual caption grouped by script
 */
export interface ScriptGroups {
  /** Lines containing CJK ideographs (target language) */
  target: string[];
  /** All other lines (source language) */
  source: string[];
}
