import { Router } from 'express';
import { createTranslateRouter, TranslateRouterOptions } from './translate';
import healthRouter from './health';

export function createApiRouter(options: TranslateRouterOptions): Router {
  const router = Router();

  router.use('/translate', createTranslateRouter(options));
  router.use('/health', healthRouter);

  return router;
}
