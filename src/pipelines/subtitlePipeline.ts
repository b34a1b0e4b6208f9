import path from 'path';
import {
  AssStyleOptions,
  CaptionEntry,
  FilledOutcome,
  SkippedOutcome,
  mergeBilingualCaptions,
  mergeCaptionLines,
  readSrtFile,
  rebuildCaptions,
  renderAssScript,
  repairOverlapsWithReport,
  writeAssFile,
  writeSrtFile,
} from '../subtitles';
import { BatchProgress, BatchTranslator, TranslationStats } from '../translation';
import { TranslationProvider } from '../llm/types';

export type PipelineStage = 'parsing' | 'repairing' | 'merging' | 'translating' | 'rendering';

export interface PipelineHooks {
  onStage?: (stage: PipelineStage, detail: string) => void | Promise<void>;
  onBatch?: (progress: BatchProgress) => void | Promise<void>;
}

export interface TranslateFileOptions extends PipelineHooks {
  provider: TranslationProvider;
  systemPrompt: string;
  /** Defaults to the input file's directory */
  outputDir?: string;
  fps?: number;
  /** Pairwise line merge before translation (default true) */
  mergeLines?: boolean;
  cjkThreshold?: number;
  batchSize?: number;
  maxAttempts?: number;
  style?: AssStyleOptions;
  signal?: AbortSignal;
}

export interface MergeFilesOptions extends PipelineHooks {
  outputDir?: string;
  style?: AssStyleOptions;
}

export interface PipelineOutputs {
  fixedSrtPath?: string;
  mergedSrtPath?: string;
  bilingualSrtPath: string;
  assPath: string;
}

export interface PipelineResult {
  outputs: PipelineOutputs;
  captions: number;
  skipped: SkippedOutcome[];
  adjustedOverlaps: number;
  filled: FilledOutcome[];
  translation?: TranslationStats;
}

/**
 * Derives a sibling output path: "dir/video.srt" + "_fix" → "dir/video_fix.srt"
 */
export function deriveOutputPath(
  inputPath: string,
  suffix: string,
  extension: string = path.extname(inputPath) || '.srt',
  outputDir?: string
): string {
  const baseName = path.basename(inputPath, path.extname(inputPath));
  return path.join(outputDir ?? path.dirname(inputPath), `${baseName}${suffix}${extension}`);
}

function logSkipped(filePath: string, skipped: SkippedOutcome[]): void {
  for (const outcome of skipped) {
    console.warn(`Skipped block ${outcome.block} in ${path.basename(filePath)}: ${outcome.reason}`);
  }
}

/**
 * Full translation path: repair → merge → translate → rebuild → render.
 *
 * Every intermediate stream is written next to the input (or into `outputDir`).
 * Once translation starts the bilingual files are always produced, with original text
 * standing in for captions the provider never returned.
 */
export async function translateSubtitleFile(
  inputPath: string,
  options: TranslateFileOptions
): Promise<PipelineResult> {
  const { onStage, onBatch, outputDir } = options;

  await onStage?.('parsing', `Parsing ${path.basename(inputPath)}`);
  const { entries, skipped } = await readSrtFile(inputPath);
  logSkipped(inputPath, skipped);
  console.info(`Parsed ${entries.length} captions from ${path.basename(inputPath)}`);

  await onStage?.('repairing', 'Repairing overlapping captions');
  const repair = repairOverlapsWithReport(entries, options.fps);
  const fixedSrtPath = deriveOutputPath(inputPath, '_fix', '.srt', outputDir);
  await writeSrtFile(fixedSrtPath, repair.entries);

  let captions: CaptionEntry[] = repair.entries;
  let mergedSrtPath: string | undefined;

  if (options.mergeLines ?? true) {
    await onStage?.('merging', 'Merging caption lines');
    captions = mergeCaptionLines(repair.entries, { cjkThreshold: options.cjkThreshold });
    mergedSrtPath = deriveOutputPath(inputPath, '_merged', '.srt', outputDir);
    await writeSrtFile(mergedSrtPath, captions);
    console.info(`Merged ${repair.entries.length} captions into ${captions.length}`);
  }

  await onStage?.('translating', `Translating ${captions.length} captions`);
  const translator = new BatchTranslator({
    provider: options.provider,
    systemPrompt: options.systemPrompt,
    batchSize: options.batchSize,
    maxAttempts: options.maxAttempts,
    onProgress: onBatch,
    signal: options.signal,
  });
  const translation = await translator.translateAll(captions);
  const bilingual = rebuildCaptions(captions, translation.texts);

  await onStage?.('rendering', 'Writing bilingual subtitles');
  const bilingualSrtPath = deriveOutputPath(inputPath, '_bilingual', '.srt', outputDir);
  const assPath = deriveOutputPath(inputPath, '_bilingual', '.ass', outputDir);
  await writeSrtFile(bilingualSrtPath, bilingual);
  await writeAssFile(assPath, renderAssScript(bilingual, options.style));

  return {
    outputs: { fixedSrtPath, mergedSrtPath, bilingualSrtPath, assPath },
    captions: bilingual.length,
    skipped,
    adjustedOverlaps: repair.adjusted,
    filled: translation.filled,
    translation: translation.stats,
  };
}

/**
 * Joins an original and an already translated SRT file by caption index, without translating
 */
export async function mergeSubtitleFiles(
  sourcePath: string,
  translatedPath: string,
  options: MergeFilesOptions = {}
): Promise<PipelineResult> {
  const { onStage, outputDir } = options;

  await onStage?.('parsing', 'Parsing subtitle files');
  const source = await readSrtFile(sourcePath);
  const translated = await readSrtFile(translatedPath);
  logSkipped(sourcePath, source.skipped);
  logSkipped(translatedPath, translated.skipped);

  await onStage?.('rendering', 'Writing bilingual subtitles');
  const bilingual = mergeBilingualCaptions(source.entries, translated.entries);
  const bilingualSrtPath = deriveOutputPath(sourcePath, '_bilingual', '.srt', outputDir);
  const assPath = deriveOutputPath(sourcePath, '_bilingual', '.ass', outputDir);
  await writeSrtFile(bilingualSrtPath, bilingual);
  await writeAssFile(assPath, renderAssScript(bilingual, options.style));

  console.info(`Merged ${bilingual.length} bilingual captions into ${path.basename(bilingualSrtPath)}`);

  return {
    outputs: { bilingualSrtPath, assPath },
    captions: bilingual.length,
    skipped: [...source.skipped, ...translated.skipped],
    adjustedOverlaps: 0,
    filled: [],
  };
}
