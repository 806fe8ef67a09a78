#!/usr/bin/env node
/**
 * Compare source, translated and (optionally) reference SRT files side by side
 * Run with: npm run compare -- source.srt translated.srt [reference.srt]
 */

import fs from 'fs';
import { Command } from 'commander';
import { readSrtFile } from '../subtitles';
import { compareTranslations, formatComparisonReport } from '../compare/compareTranslations';
import { config } from '../config';
import { logger, setLogLevel } from '../utils/logger';
import { parseInteger } from '../utils/cli';

interface CompareCliOptions {
  maxEntries: number;
  similarity: boolean;
  verbose?: boolean;
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('srt-compare')
    .description('Compare SRT translation files to verify quality')
    .argument('<source>', 'Path to source SRT file')
    .argument('<translated>', 'Path to translated SRT file')
    .argument('[reference]', 'Path to reference SRT file (optional)')
    .option('--max-entries <number>', 'Maximum entries to compare', parseInteger, config.compareMaxEntries)
    .option('--no-similarity', 'Hide similarity scores')
    .option('-v, --verbose', 'Enable verbose logging')
    .parse(process.argv);

  const opts = program.opts<CompareCliOptions>();
  const [sourcePath, translatedPath, referencePath] = program.args;
  if (!sourcePath || !translatedPath) {
    return program.error('source and translated paths are required');
  }

  // Comparison output goes to stdout; keep file-loading chatter out of it unless asked
  setLogLevel(opts.verbose ? 'debug' : 'warn');

  for (const filePath of [sourcePath, translatedPath, referencePath]) {
    if (filePath !== undefined && !fs.existsSync(filePath)) {
      logger.error(`File not found: ${filePath}`);
      process.exit(1);
    }
  }

  const report = compareTranslations({
    source: await readSrtFile(sourcePath),
    translated: await readSrtFile(translatedPath),
    reference: referencePath ? await readSrtFile(referencePath) : undefined,
    maxEntries: opts.maxEntries,
    showSimilarity: opts.similarity,
  });

  console.info(formatComparisonReport(report));
}

main().catch((error) => {
  logger.error(`Comparison failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
