import { Router, Request, Response } from 'express';
import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { jobStore, isValidJobId, FileRole, UploadedFile } from '../jobs';
import { asyncHandler } from './asyncHandler';
import { config } from '../config';

const router = Router();

/**
 * Configure multer storage
 */
const storage = multer.diskStorage({
  destination: (req, _file, cb) => {
    const jobId = req.params.jobId;
    if (!jobId || !isValidJobId(jobId)) {
      cb(new Error('Invalid job id'), '');
      return;
    }
    const uploadDir = jobStore.getUploadDir(jobId);
    if (!fs.existsSync(uploadDir)) {
      fs.mkdirSync(uploadDir, { recursive: true });
    }
    cb(null, uploadDir);
  },
  filename: (_req, file, cb) => {
    // Timestamp prefix avoids collisions between source and translated uploads
    const timestamp = Date.now();
    const safeName = file.originalname.replace(/[^a-zA-Z0-9.-]/g, '_');
    cb(null, `${timestamp}_${safeName}`);
  },
});

const upload = multer({
  storage,
  limits: {
    fileSize: config.maxFileSize,
  },
  fileFilter: (_req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();

    if (ext === '.srt') {
      cb(null, true);
    } else {
      cb(new Error(`Unsupported file type: ${ext}`));
    }
  },
});

function parseRole(value: unknown): FileRole | null {
  if (value === undefined || value === 'source') return 'source';
  if (value === 'translated') return 'translated';
  return null;
}

/**
 * POST /api/upload/:jobId/srt?role=source|translated
 * Upload one SRT file for a job
 */
router.post(
  '/:jobId/srt',
  upload.single('file'),
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.jobId ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.status !== 'pending') {
      res.status(400).json({ error: 'Cannot upload files after job has started' });
      return;
    }

    const role = parseRole(req.query.role);
    if (!role) {
      res.status(400).json({ error: 'role must be source or translated' });
      return;
    }

    const file = req.file;
    if (!file) {
      res.status(400).json({ error: 'No file uploaded' });
      return;
    }

    const uploaded: UploadedFile = {
      originalName: file.originalname,
      storedName: file.filename,
      path: file.path,
      size: file.size,
      role,
    };

    await jobStore.addFiles(jobId, [uploaded]);

    res.json({
      message: `${role} SRT file uploaded`,
      file: { name: uploaded.originalName, role, size: uploaded.size },
    });
  })
);

/**
 * GET /api/upload/:jobId/files
 * List uploaded files for a job
 */
router.get(
  '/:jobId/files',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.jobId ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    res.json({
      files: job.files.map((f) => ({
        name: f.originalName,
        role: f.role,
        size: f.size,
      })),
    });
  })
);

export default router;
