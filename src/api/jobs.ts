import { Router, Request, Response } from 'express';
import path from 'path';
import fs from 'fs';
import { jobStore, validateJobConfig, calculateOverallProgress, Job, JobOutputs } from '../jobs';
import { subtitleJobRunner } from '../pipelines';
import { asyncHandler } from './asyncHandler';

const router = Router();

type DownloadType = 'fixed-srt' | 'merged-srt' | 'bilingual-srt' | 'ass';

const DOWNLOADS: Record<DownloadType, { output: keyof JobOutputs; suffix: string }> = {
  'fixed-srt': { output: 'fixedSrtPath', suffix: '_fix.srt' },
  'merged-srt': { output: 'mergedSrtPath', suffix: '_merged.srt' },
  'bilingual-srt': { output: 'bilingualSrtPath', suffix: '_bilingual.srt' },
  ass: { output: 'assPath', suffix: '_bilingual.ass' },
};

function isDownloadType(value: string): value is DownloadType {
  return Object.prototype.hasOwnProperty.call(DOWNLOADS, value);
}

function downloadBaseName(job: Job): string {
  return job.config.title.replace(/[^a-zA-Z0-9._-]/g, '_');
}

/**
 * GET /api/jobs
 * List all jobs
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    const jobs = await jobStore.list();
    res.json({ jobs });
  })
);

/**
 * POST /api/jobs
 * Create a new job
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const validation = validateJobConfig(
      typeof body === 'object' && body !== null && 'config' in body ? body.config : undefined
    );

    if (!validation.ok) {
      res.status(400).json({ error: validation.error, ...validation.details });
      return;
    }

    const job = await jobStore.create({ config: validation.config });
    res.status(201).json({ job });
  })
);

/**
 * GET /api/jobs/:id
 * Get job details
 */
router.get(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const job = await jobStore.get(req.params.id ?? '');

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    const overallProgress = calculateOverallProgress(job);
    res.json({ job, overallProgress });
  })
);

/**
 * POST /api/jobs/:id/start
 * Start processing a job
 */
router.post(
  '/:id/start',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.status !== 'pending') {
      res.status(400).json({ error: 'Job has already been started' });
      return;
    }

    // Run in background; failures are recorded on the job
    subtitleJobRunner.run(jobId).catch((error: unknown) => {
      console.error(`Pipeline failed for job ${jobId}:`, error);
    });

    res.json({ message: 'Job started', jobId });
  })
);

/**
 * POST /api/jobs/:id/cancel
 * Stop a running job before its next translation batch
 */
router.post(
  '/:id/cancel',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';

    if (!subtitleJobRunner.cancel(jobId)) {
      res.status(409).json({ error: 'Job is not running' });
      return;
    }

    res.json({ message: 'Cancellation requested', jobId });
  })
);

/**
 * DELETE /api/jobs/:id
 * Delete a job
 */
router.delete(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';

    if (subtitleJobRunner.isRunning(jobId)) {
      res.status(409).json({ error: 'Job is still running' });
      return;
    }

    const deleted = await jobStore.delete(jobId);

    if (!deleted) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    res.json({ message: 'Job deleted' });
  })
);

/**
 * GET /api/jobs/:id/download/:type
 * Download job outputs
 */
router.get(
  '/:id/download/:type',
  asyncHandler(async (req: Request, res: Response) => {
    const job = await jobStore.get(req.params.id ?? '');

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.status !== 'completed') {
      res.status(400).json({ error: 'Job not completed' });
      return;
    }

    const type = req.params.type ?? '';
    if (!isDownloadType(type)) {
      res.status(400).json({ error: 'Invalid download type' });
      return;
    }

    const { output, suffix } = DOWNLOADS[type];
    const filePath = job.outputs?.[output];

    if (!filePath) {
      res.status(404).json({ error: `${type} not available for this job` });
      return;
    }

    const fullPath = jobStore.resolveOutputPath(filePath);

    if (!fs.existsSync(fullPath)) {
      res.status(404).json({ error: 'File not found' });
      return;
    }

    res.download(fullPath, `${downloadBaseName(job)}${suffix}`);
  })
);

/**
 * GET /api/jobs/:id/outputs
 * List the output files a job produced
 */
router.get(
  '/:id/outputs',
  asyncHandler(async (req: Request, res: Response) => {
    const job = await jobStore.get(req.params.id ?? '');

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    const available = Object.entries(DOWNLOADS)
      .filter(([, { output }]) => Boolean(job.outputs?.[output]))
      .map(([type, { output }]) => ({ type, file: path.basename(job.outputs?.[output] ?? '') }));

    res.json({ outputs: available, stats: job.stats });
  })
);

export default router;
