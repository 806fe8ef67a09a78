#!/usr/bin/env node
/**
 * Translate an SRT file using a reference SRT file in the target language
 * Run with: npm run translate -- source.srt context.srt output.srt
 */

import { runTranslateCommand } from './translateCommand';
import { logger } from '../utils/logger';

runTranslateCommand(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    logger.error(`Translation failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
