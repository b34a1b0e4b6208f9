import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import apiRouter from './api';
import { config } from './config';

// Errors raised before a route handler runs (multer, body parsing) that are the client's fault
const CLIENT_ERRORS: Array<[pattern: string, status: number]> = [
  ['Unsupported file type', 400],
  ['Invalid job id', 400],
  ['File too large', 413],
];

export function errorStatus(err: Error): number {
  const match = CLIENT_ERRORS.find(([pattern]) => err.message.includes(pattern));
  return match ? match[1] : 500;
}

export function createApp(): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use('/api', apiRouter);

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Error:', err.message);

    const status = errorStatus(err);
    if (status !== 500) {
      res.status(status).json({ error: err.message });
      return;
    }

    res.status(500).json({
      error: config.nodeEnv === 'development' ? err.message : 'Internal server error',
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
