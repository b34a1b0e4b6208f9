import type { LLMProviderType } from '../llm/types';
import type { TranslationStats } from '../translation/types';

/**
 * Possible job status values
 */
export type JobStatus =
  | 'pending'
  | 'validating'
  | 'parsing'
  | 'repairing'
  | 'merging'
  | 'translating'
  | 'rendering'
  | 'completed'
  | 'failed';

export type JobMode = 'translate' | 'merge';

export type JobLogLevel = 'info' | 'warn' | 'error' | 'success';

export interface JobLogEntry {
  timestamp: Date;
  level: JobLogLevel;
  message: string;
  stage: JobStatus;
}

/**
 * Detailed progress information for a job
 */
export interface JobProgress {
  stage: JobStatus;
  stageProgress: number; // 0-100
  currentStep: string;
  startedAt?: Date;
  completedStages: JobStatus[];
  errors: string[];
  logs: JobLogEntry[];
}

/**
 * Job configuration input
 */
export interface JobConfig {
  title: string;
  mode: JobMode;
  llmProvider: LLMProviderType;
  mergeLines?: boolean;
  fps?: number;
  batchSize?: number;
  sourceFontSize?: number;
  targetFontSize?: number;
}

/**
 * "source" is the file to translate; "translated" is only used in merge mode
 */
export type FileRole = 'source' | 'translated';

/**
 * File reference for uploaded files
 */
export interface UploadedFile {
  originalName: string;
  storedName: string;
  path: string;
  size: number;
  role: FileRole;
}

export interface JobOutputs {
  fixedSrtPath?: string;
  mergedSrtPath?: string;
  bilingualSrtPath?: string;
  assPath?: string;
}

export interface JobStats {
  captions: number;
  skippedBlocks: number;
  adjustedOverlaps: number;
  filledCaptions: number;
  translation?: TranslationStats;
}

/**
 * Complete job definition
 */
export interface Job {
  id: string;
  config: JobConfig;
  status: JobStatus;
  progress: JobProgress;

  files: UploadedFile[];

  // Output paths (relative to outputs dir)
  outputs?: JobOutputs;
  stats?: JobStats;

  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
  error?: string;
}

export interface CreateJobRequest {
  config: JobConfig;
}

export interface JobListItem {
  id: string;
  title: string;
  mode: JobMode;
  status: JobStatus;
  createdAt: Date;
  progress: number; // 0-100 overall
}

/**
 * Ordered stages a job passes through for its mode
 */
export function stagesForJob(config: Pick<JobConfig, 'mode' | 'mergeLines'>): JobStatus[] {
  if (config.mode === 'merge') {
    return ['pending', 'validating', 'parsing', 'rendering', 'completed'];
  }

  const stages: JobStatus[] = [
    'pending',
    'validating',
    'parsing',
    'repairing',
    'merging',
    'translating',
    'rendering',
    'completed',
  ];
  return config.mergeLines === false ? stages.filter((s) => s !== 'merging') : stages;
}

/**
 * Calculates overall progress percentage from job status
 */
export function calculateOverallProgress(job: Job): number {
  if (job.status === 'completed') return 100;
  if (job.status === 'failed') return job.progress.stageProgress;

  const stages = stagesForJob(job.config);
  const currentIndex = stages.indexOf(job.status);
  if (currentIndex === -1) return 0;

  const stageWeight = 100 / (stages.length - 1); // -1 for completed
  const baseProgress = currentIndex * stageWeight;
  const stageProgress = (job.progress.stageProgress / 100) * stageWeight;

  return Math.min(99, Math.round(baseProgress + stageProgress));
}
