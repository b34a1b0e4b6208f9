import { Router, Request, Response } from 'express';
import { testAllProviders } from '../llm';
import { config } from '../config';
import { asyncHandler } from './asyncHandler';

const router = Router();

/**
 * GET /api/health
 * Health check endpoint
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    const llmStatus = await testAllProviders();
    const anyProvider = Boolean(llmStatus.get('openai') || llmStatus.get('anthropic'));

    res.json({
      status: anyProvider ? 'healthy' : 'degraded',
      services: {
        llm: {
          openai: llmStatus.get('openai') ?? false,
          anthropic: llmStatus.get('anthropic') ?? false,
        },
      },
      config: {
        defaultProvider: config.translationProvider,
        batchSize: config.translationBatchSize,
        maxAttempts: config.translationMaxAttempts,
        fps: config.subtitleFps,
        fontSizes: {
          source: config.assSourceFontSize,
          target: config.assTargetFontSize,
        },
      },
    });
  })
);

export default router;
