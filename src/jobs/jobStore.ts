import fs from 'fs';
import path from 'path';
import { v4 as uuidv4, validate as validateUuid } from 'uuid';
import {
  Job,
  JobLogLevel,
  JobStatus,
  CreateJobRequest,
  JobListItem,
  UploadedFile,
  calculateOverallProgress,
} from './types';
import { config } from '../config';

const MAX_LOG_ENTRIES = 100;

/**
 * True for ids `create` can hand out. Anything else never reaches a file path.
 */
export function isValidJobId(jobId: string): boolean {
  return validateUuid(jobId);
}

function assertValidJobId(jobId: string): void {
  if (!isValidJobId(jobId)) {
    throw new Error(`Invalid job id: ${jobId}`);
  }
}

export interface JobStoreDirs {
  jobsDir: string;
  uploadsDir: string;
  outputsDir: string;
}

/**
 * Simple file-based job store, one JSON file per job
 */
export class JobStore {
  private dirs: JobStoreDirs;

  constructor(dirs?: Partial<JobStoreDirs>) {
    this.dirs = {
      jobsDir: dirs?.jobsDir ?? config.jobsDir,
      uploadsDir: dirs?.uploadsDir ?? config.uploadsDir,
      outputsDir: dirs?.outputsDir ?? config.outputsDir,
    };
  }

  private ensureDirectory(dir: string): void {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  private getJobPath(jobId: string): string {
    assertValidJobId(jobId);
    return path.join(this.dirs.jobsDir, `${jobId}.json`);
  }

  async create(request: CreateJobRequest): Promise<Job> {
    const jobId = uuidv4();
    const now = new Date();

    const job: Job = {
      id: jobId,
      config: request.config,
      status: 'pending',
      progress: {
        stage: 'pending',
        stageProgress: 0,
        currentStep: 'Waiting to start',
        completedStages: [],
        errors: [],
        logs: [],
      },
      files: [],
      createdAt: now,
      updatedAt: now,
    };

    await this.save(job);

    this.ensureDirectory(this.getUploadDir(jobId));
    this.ensureDirectory(this.getOutputDir(jobId));

    return job;
  }

  async get(jobId: string): Promise<Job | null> {
    if (!isValidJobId(jobId)) {
      return null;
    }

    const jobPath = this.getJobPath(jobId);

    if (!fs.existsSync(jobPath)) {
      return null;
    }

    try {
      const content = fs.readFileSync(jobPath, 'utf-8');
      const job = JSON.parse(content) as Job;

      // Convert date strings back to Date objects
      job.createdAt = new Date(job.createdAt);
      job.updatedAt = new Date(job.updatedAt);
      if (job.completedAt) {
        job.completedAt = new Date(job.completedAt);
      }
      if (job.progress.startedAt) {
        job.progress.startedAt = new Date(job.progress.startedAt);
      }
      job.progress.logs = (job.progress.logs ?? []).map((entry) => ({
        ...entry,
        timestamp: new Date(entry.timestamp),
      }));

      return job;
    } catch (error) {
      console.error(`Failed to read job ${jobId}:`, error);
      return null;
    }
  }

  async save(job: Job): Promise<void> {
    this.ensureDirectory(this.dirs.jobsDir);
    job.updatedAt = new Date();
    fs.writeFileSync(this.getJobPath(job.id), JSON.stringify(job, null, 2), 'utf-8');
  }

  private async require(jobId: string): Promise<Job> {
    const job = await this.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }
    return job;
  }

  /**
   * Moves a job to a new status, marking the previous one as completed
   */
  async updateStatus(
    jobId: string,
    status: JobStatus,
    currentStep: string,
    stageProgress: number = 0
  ): Promise<void> {
    const job = await this.require(jobId);

    if (job.status !== status && job.status !== 'pending' && job.status !== 'failed') {
      job.progress.completedStages.push(job.status);
    }
    if (job.status === 'pending' && status !== 'pending') {
      job.progress.startedAt = new Date();
    }

    job.status = status;
    job.progress.stage = status;
    job.progress.stageProgress = stageProgress;
    job.progress.currentStep = currentStep;

    if (status === 'completed') {
      job.completedAt = new Date();
    }

    await this.save(job);
  }

  async updateProgress(jobId: string, currentStep: string, stageProgress: number): Promise<void> {
    const job = await this.require(jobId);

    job.progress.currentStep = currentStep;
    job.progress.stageProgress = stageProgress;

    await this.save(job);
  }

  async setFailed(jobId: string, error: string): Promise<void> {
    const job = await this.require(jobId);

    job.status = 'failed';
    job.progress.stage = 'failed';
    job.progress.errors.push(error);
    job.error = error;
    job.completedAt = new Date();
    this.appendLog(job, 'error', `Pipeline failed: ${error}`);

    await this.save(job);
  }

  private appendLog(job: Job, level: JobLogLevel, message: string, stage?: JobStatus): void {
    job.progress.logs.push({
      timestamp: new Date(),
      level,
      message,
      stage: stage ?? job.status,
    });

    if (job.progress.logs.length > MAX_LOG_ENTRIES) {
      job.progress.logs = job.progress.logs.slice(-MAX_LOG_ENTRIES);
    }
  }

  /**
   * Adds a log entry to a job; unknown jobs are ignored
   */
  async addLog(jobId: string, level: JobLogLevel, message: string, stage?: JobStatus): Promise<void> {
    const job = await this.get(jobId);
    if (!job) {
      return;
    }

    this.appendLog(job, level, message, stage);
    await this.save(job);
  }

  /**
   * Adds uploaded files to a job. A new file replaces any earlier one with the same role.
   */
  async addFiles(jobId: string, files: UploadedFile[]): Promise<void> {
    const job = await this.require(jobId);

    const roles = new Set(files.map((f) => f.role));
    job.files = [...job.files.filter((f) => !roles.has(f.role)), ...files];

    await this.save(job);
  }

  async list(): Promise<JobListItem[]> {
    this.ensureDirectory(this.dirs.jobsDir);
    const files = fs.readdirSync(this.dirs.jobsDir).filter((f) => f.endsWith('.json'));

    const jobs: JobListItem[] = [];

    for (const file of files) {
      const job = await this.get(path.basename(file, '.json'));

      if (job) {
        jobs.push({
          id: job.id,
          title: job.config.title,
          mode: job.config.mode,
          status: job.status,
          createdAt: job.createdAt,
          progress: calculateOverallProgress(job),
        });
      }
    }

    // Newest first
    return jobs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Deletes a job and its upload/output directories
   */
  async delete(jobId: string): Promise<boolean> {
    if (!isValidJobId(jobId)) {
      return false;
    }

    const jobPath = this.getJobPath(jobId);

    if (!fs.existsSync(jobPath)) {
      return false;
    }

    fs.unlinkSync(jobPath);

    for (const dir of [this.getUploadDir(jobId), this.getOutputDir(jobId)]) {
      if (fs.existsSync(dir)) {
        fs.rmSync(dir, { recursive: true });
      }
    }

    return true;
  }

  getUploadDir(jobId: string): string {
    assertValidJobId(jobId);
    return path.join(this.dirs.uploadsDir, jobId);
  }

  getOutputDir(jobId: string): string {
    assertValidJobId(jobId);
    return path.join(this.dirs.outputsDir, jobId);
  }

  /**
   * Resolves a stored output path (relative to the outputs dir)
   */
  resolveOutputPath(relativePath: string): string {
    return path.join(this.dirs.outputsDir, relativePath);
  }

  relativeOutputPath(absolutePath: string): string {
    return path.relative(this.dirs.outputsDir, absolutePath);
  }
}

// Singleton instance
export const jobStore = new JobStore();
