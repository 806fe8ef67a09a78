import fs from 'fs';
import { Command, Option } from 'commander';
import {
  PipelineFactoryOptions,
  TranslationPipeline,
  createTranslationPipeline,
} from '../pipelines/translationPipeline';
import { LLM_PROVIDER_TYPES } from '../llm/types';
import { isLLMProviderType } from '../llm/llmFactory';
import { config } from '../config';
import { logger, setLogLevel } from '../utils/logger';
import { parseInteger } from '../utils/cli';

interface TranslateCliOptions {
  sourceLang?: string;
  targetLang?: string;
  provider: string;
  model?: string;
  apiBase?: string;
  maxEntries?: number;
  contextRange: number;
  maxTokens: number;
  verbose?: boolean;
}

export interface TranslateCommandDeps {
  createPipeline?: (options: PipelineFactoryOptions) => TranslationPipeline;
}

function buildProgram(): Command {
  return new Command()
    .name('srt-translate')
    .description('Translate SRT subtitle files with an LLM, guided by a reference SRT in the target language')
    .argument('<source>', 'Path to source SRT file to translate')
    .argument('<context>', 'Path to context SRT file for reference')
    .argument('<output>', 'Path for output translated SRT file')
    .option('--source-lang <code>', 'Source language code (auto-detected if not specified)')
    .option('--target-lang <code>', 'Target language code (auto-detected if not specified)')
    .addOption(
      new Option('--provider <name>', 'LLM provider to use')
        .choices([...LLM_PROVIDER_TYPES])
        .default(config.llmProvider)
    )
    .option('--model <id>', 'Model identifier (defaults to the provider model from .env)')
    .option('--api-base <url>', 'Endpoint override for the provider')
    .option('--max-entries <number>', 'Maximum entries to translate (for testing)', parseInteger)
    .option(
      '--context-range <number>',
      'Number of context entries on each side of the current one',
      parseInteger,
      config.contextRadius
    )
    .option('--max-tokens <number>', 'Maximum tokens for LLM response', parseInteger, config.llmMaxTokens)
    .option('-v, --verbose', 'Enable verbose logging');
}

/**
 * Runs the translate command
 * @param argv - Full argument vector, node binary and script path first
 * @returns Process exit code
 */
export async function runTranslateCommand(argv: readonly string[], deps: TranslateCommandDeps = {}): Promise<number> {
  const program = buildProgram().parse([...argv]);

  const opts = program.opts<TranslateCliOptions>();
  const [sourcePath, contextPath, outputPath] = program.args;
  if (!sourcePath || !contextPath || !outputPath) {
    return program.error('source, context and output paths are required');
  }

  setLogLevel(opts.verbose ? 'debug' : config.logLevel);

  // Validate input files
  for (const filePath of [sourcePath, contextPath]) {
    if (!fs.existsSync(filePath)) {
      logger.error(`File not found: ${filePath}`);
      return 1;
    }
  }

  if (!isLLMProviderType(opts.provider)) {
    return program.error(`Unknown provider: ${opts.provider}`);
  }

  const createPipeline = deps.createPipeline ?? createTranslationPipeline;
  const pipeline = createPipeline({
    provider: opts.provider,
    model: opts.model,
    apiBase: opts.apiBase,
    maxTokens: opts.maxTokens,
  });

  try {
    const stats = await pipeline.run({
      sourcePath,
      contextPath,
      outputPath,
      sourceLanguage: opts.sourceLang,
      targetLanguage: opts.targetLang,
      maxEntries: opts.maxEntries,
      contextRadius: opts.contextRange,
    });

    console.info(`\n✅ Translation completed successfully!`);
    console.info(`📁 Output file: ${stats.outputFile ?? outputPath}`);
    console.info(`📊 Statistics:`);
    console.info(`   Total entries: ${stats.totalEntries}`);
    console.info(`   Successful translations: ${stats.successfulTranslations}`);
    console.info(`   Failed translations: ${stats.failedTranslations}`);
    console.info(`   Skipped (empty) entries: ${stats.skippedEntries}`);
    console.info(`   Success rate: ${(stats.successRate * 100).toFixed(1)}%`);
    console.info(`   Source language: ${stats.sourceLanguage}`);
    console.info(`   Target language: ${stats.targetLanguage}`);
    return 0;
  } catch (error) {
    logger.error(`Translation failed: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
