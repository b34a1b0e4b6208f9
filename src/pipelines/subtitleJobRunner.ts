import fs from 'fs';
import { Job, JobOutputs, JobStatus, UploadedFile } from '../jobs/types';
import { jobStore, JobStore } from '../jobs/jobStore';
import { createTranslationProvider, LLMProviderType, TranslationProvider } from '../llm';
import { loadSystemPrompt } from '../translation';
import { config, Config } from '../config';
import { errorMessage } from '../errors';
import {
  mergeSubtitleFiles,
  PipelineOutputs,
  PipelineResult,
  PipelineStage,
  translateSubtitleFile,
} from './subtitlePipeline';

export type RunnerSettings = Pick<
  Config,
  | 'promptsDir'
  | 'translationBatchSize'
  | 'translationMaxAttempts'
  | 'subtitleFps'
  | 'mergeCjkThreshold'
  | 'assSourceFontSize'
  | 'assTargetFontSize'
>;

export interface SubtitleJobRunnerOptions {
  store?: JobStore;
  settings?: RunnerSettings;
  providerFactory?: (type: LLMProviderType) => TranslationProvider;
}

/**
 * Runs subtitle jobs from the job store, mirroring pipeline stages onto job status
 */
export class SubtitleJobRunner {
  private store: JobStore;
  private settings: RunnerSettings;
  private providerFactory: (type: LLMProviderType) => TranslationProvider;
  private controllers = new Map<string, AbortController>();

  constructor(options: SubtitleJobRunnerOptions = {}) {
    this.store = options.store ?? jobStore;
    this.settings = options.settings ?? config;
    this.providerFactory = options.providerFactory ?? ((type) => createTranslationProvider(type));
  }

  /**
   * Runs the complete pipeline for a job
   */
  async run(jobId: string): Promise<void> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }

    const controller = new AbortController();
    this.controllers.set(jobId, controller);

    try {
      const { source, translated } = await this.validateInputs(job);

      const result =
        job.config.mode === 'merge' && translated
          ? await this.mergeFiles(job, source, translated)
          : await this.translateFile(job, source, controller.signal);

      await this.recordWarnings(job.id, result);

      const current = (await this.store.get(jobId)) ?? job;
      current.outputs = this.relativeOutputs(result.outputs);
      current.stats = {
        captions: result.captions,
        skippedBlocks: result.skipped.length,
        adjustedOverlaps: result.adjustedOverlaps,
        filledCaptions: result.filled.length,
        translation: result.translation,
      };
      await this.store.save(current);

      await this.store.updateStatus(jobId, 'completed', 'Bilingual subtitles ready', 100);
      await this.store.addLog(jobId, 'success', `Wrote ${result.captions} bilingual captions`);
    } catch (error) {
      await this.store.setFailed(jobId, errorMessage(error));
      throw error;
    } finally {
      this.controllers.delete(jobId);
    }
  }

  /**
   * Requests cancellation; takes effect before the next translation batch
   * @returns false when the job is not running
   */
  cancel(jobId: string): boolean {
    const controller = this.controllers.get(jobId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  isRunning(jobId: string): boolean {
    return this.controllers.has(jobId);
  }

  private async validateInputs(
    job: Job
  ): Promise<{ source: UploadedFile; translated?: UploadedFile }> {
    await this.store.updateStatus(job.id, 'validating', 'Validating input files', 0);

    const source = job.files.find((f) => f.role === 'source');
    if (!source) {
      throw new Error('No source SRT file uploaded');
    }

    const translated = job.files.find((f) => f.role === 'translated');
    if (job.config.mode === 'merge' && !translated) {
      throw new Error('Merge mode needs a translated SRT file');
    }

    for (const file of [source, translated]) {
      if (file && !fs.existsSync(file.path)) {
        throw new Error(`File not found: ${file.originalName}`);
      }
    }

    await this.store.updateProgress(job.id, 'Input validation complete', 100);
    return { source, translated };
  }

  private async translateFile(job: Job, source: UploadedFile, signal: AbortSignal): Promise<PipelineResult> {
    // Fail on a missing credential or prompt before any file is written
    const provider = this.providerFactory(job.config.llmProvider);
    const systemPrompt = await loadSystemPrompt(this.settings.promptsDir);

    return translateSubtitleFile(source.path, {
      provider,
      systemPrompt,
      outputDir: this.store.getOutputDir(job.id),
      fps: job.config.fps ?? this.settings.subtitleFps,
      mergeLines: job.config.mergeLines ?? true,
      cjkThreshold: this.settings.mergeCjkThreshold,
      batchSize: job.config.batchSize ?? this.settings.translationBatchSize,
      maxAttempts: this.settings.translationMaxAttempts,
      style: this.styleFor(job),
      signal,
      onStage: (stage, detail) => this.enterStage(job.id, stage, detail),
      onBatch: (progress) =>
        this.store.updateProgress(
          job.id,
          `Translated batch ${progress.batchNumber}/${progress.totalBatches}`,
          Math.round((progress.resolved / progress.total) * 100)
        ),
    });
  }

  private async mergeFiles(
    job: Job,
    source: UploadedFile,
    translated: UploadedFile
  ): Promise<PipelineResult> {
    return mergeSubtitleFiles(source.path, translated.path, {
      outputDir: this.store.getOutputDir(job.id),
      style: this.styleFor(job),
      onStage: (stage, detail) => this.enterStage(job.id, stage, detail),
    });
  }

  private async enterStage(jobId: string, stage: PipelineStage, detail: string): Promise<void> {
    const status: JobStatus = stage;
    await this.store.updateStatus(jobId, status, detail, 0);
    await this.store.addLog(jobId, 'info', detail, status);
  }

  private styleFor(job: Job): { sourceFontSize: number; targetFontSize: number } {
    return {
      sourceFontSize: job.config.sourceFontSize ?? this.settings.assSourceFontSize,
      targetFontSize: job.config.targetFontSize ?? this.settings.assTargetFontSize,
    };
  }

  private async recordWarnings(jobId: string, result: PipelineResult): Promise<void> {
    if (result.skipped.length > 0) {
      await this.store.addLog(
        jobId,
        'warn',
        `Skipped ${result.skipped.length} malformed block(s): ${result.skipped.map((s) => s.block).join(', ')}`
      );
    }
    if (result.adjustedOverlaps > 0) {
      await this.store.addLog(jobId, 'info', `Shortened ${result.adjustedOverlaps} overlapping caption(s)`);
    }
    if (result.filled.length > 0) {
      await this.store.addLog(
        jobId,
        'warn',
        `Kept original text for ${result.filled.length} untranslated caption(s): ` +
          result.filled.map((f) => f.sequence).join(', ')
      );
    }
  }

  private relativeOutputs(outputs: PipelineOutputs): JobOutputs {
    const relative = (p?: string): string | undefined =>
      p === undefined ? undefined : this.store.relativeOutputPath(p);

    return {
      fixedSrtPath: relative(outputs.fixedSrtPath),
      mergedSrtPath: relative(outputs.mergedSrtPath),
      bilingualSrtPath: relative(outputs.bilingualSrtPath),
      assPath: relative(outputs.assPath),
    };
  }
}

// Singleton instance
export const subtitleJobRunner = new SubtitleJobRunner();
