import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createApiRouter } from './api';
import { HttpError } from './api/errors';
import { TranslateRouterOptions } from './api/translate';
import { createSubtitleTranslator } from './pipelines';
import { config } from './config';
import { logger } from './utils/logger';

export type AppOptions = Partial<TranslateRouterOptions>;

/**
 * Builds the express app. Settings not given fall back to the environment configuration.
 */
export function createApp(options: AppOptions = {}): Express {
  const outputsDir = options.outputsDir ?? config.outputsDir;
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // API routes
  app.use(
    '/api',
    createApiRouter({
      outputsDir,
      maxFileSize: options.maxFileSize ?? config.maxFileSize,
      contextRadius: options.contextRadius ?? config.contextRadius,
      guideMaxEntries: options.guideMaxEntries ?? config.guideMaxEntries,
      createTranslator: options.createTranslator ?? ((provider) => createSubtitleTranslator({ provider })),
    })
  );

  // Serve translated files for download
  app.use('/outputs', express.static(outputsDir));

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Error: ${err.message}`);

    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message });
      return;
    }

    if (err.message.includes('Unsupported file type')) {
      res.status(400).json({ error: err.message });
      return;
    }

    if (err.message.includes('File too large')) {
      res.status(413).json({ error: 'File too large' });
      return;
    }

    res.status(500).json({
      error: config.nodeEnv === 'development' ? err.message : 'Internal server error',
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
