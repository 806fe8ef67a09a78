import { Router, Request, Response } from 'express';
import { testAllProviders } from '../llm';
import { asyncHandler } from './errors';
import { config } from '../config';

const router = Router();

/**
 * GET /api/health
 * Health check endpoint
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    const llmStatus = await testAllProviders();
    const anthropic = llmStatus.get('anthropic') ?? false;
    const openai = llmStatus.get('openai') ?? false;

    res.json({
      status: anthropic || openai ? 'healthy' : 'degraded',
      services: {
        llm: { anthropic, openai },
      },
      config: {
        defaultProvider: config.llmProvider,
        contextRadius: config.contextRadius,
        guideMaxEntries: config.guideMaxEntries,
        maxTokens: config.llmMaxTokens,
      },
    });
  })
);

export default router;
