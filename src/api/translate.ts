import { Router, Request, Response } from 'express';
import multer from 'multer';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { parseSrt, writeSrtFile } from '../subtitles';
import { SubtitleTranslator } from '../translation/translator';
import { LLMProviderType } from '../llm/types';
import { asyncHandler, HttpError } from './errors';
import { parseTranslateFields } from './requestFields';
import { logger } from '../utils/logger';

export interface TranslateRouterOptions {
  /** Directory translated files are written to */
  outputsDir: string;
  /** Upload size limit in bytes, per file */
  maxFileSize: number;
  contextRadius: number;
  guideMaxEntries: number;
  /** Builds the translator for a request; receives the requested provider, if any */
  createTranslator: (provider?: LLMProviderType) => SubtitleTranslator;
}

function uploadedFile(req: Request, field: string): Express.Multer.File {
  const files: Record<string, Express.Multer.File[]> =
    req.files && !Array.isArray(req.files) ? req.files : {};
  const file = files[field]?.[0];
  if (!file) {
    throw new HttpError(400, `Missing ${field} SRT file`);
  }
  return file;
}

export function createTranslateRouter(options: TranslateRouterOptions): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.maxFileSize,
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

  /**
   * POST /api/translate
   * Translate an uploaded source SRT guided by an uploaded context SRT
   */
  router.post(
    '/',
    upload.fields([
      { name: 'source', maxCount: 1 },
      { name: 'context', maxCount: 1 },
    ]),
    asyncHandler(async (req: Request, res: Response) => {
      const sourceFile = uploadedFile(req, 'source');
      const contextFile = uploadedFile(req, 'context');
      const fields = parseTranslateFields(req.body);

      const source = parseSrt(sourceFile.buffer);
      const context = parseSrt(contextFile.buffer);
      logger.info(
        `Translate request: ${sourceFile.originalname} (${source.length} entries) ` +
          `with context ${contextFile.originalname} (${context.length} entries)`
      );

      const translator = options.createTranslator(fields.provider);
      const { entries, results, stats } = await translator.translateSubtitles(source, context, {
        sourceLanguage: fields.sourceLanguage,
        targetLanguage: fields.targetLanguage,
        maxEntries: fields.maxEntries,
        contextRadius: fields.contextRadius ?? options.contextRadius,
        guideMaxEntries: options.guideMaxEntries,
      });

      const id = uuidv4();
      const fileName = `${id}.srt`;
      await writeSrtFile(path.join(options.outputsDir, fileName), entries);

      res.json({
        id,
        stats: { ...stats, outputFile: fileName },
        results: results.map((result) => ({
          index: result.entry.index,
          outcome: result.outcome,
          failureReason: result.failureReason ?? null,
        })),
        downloadUrl: `/outputs/${fileName}`,
      });
    })
  );

  return router;
}
