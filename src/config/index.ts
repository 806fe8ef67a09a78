import dotenv from 'dotenv';
import path from 'path';
import { LLMProviderType } from '../llm/types';
import { LogLevel, isLogLevel } from '../utils/logger';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface Config {
  // Server
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;

  // LLM
  llmProvider: LLMProviderType;
  llmMaxTokens: number;
  llmMaxRetries: number;

  // Anthropic
  anthropicApiKey: string;
  anthropicModel: string;
  anthropicBaseUrl: string;

  // OpenAI (or any OpenAI-compatible endpoint)
  openaiApiKey: string;
  openaiApiBase: string;
  openaiModel: string;

  // Translation defaults
  contextRadius: number;
  guideMaxEntries: number;
  compareMaxEntries: number;

  // File paths
  dataDir: string;
  outputsDir: string;

  // Uploads
  maxFileSize: number;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvProvider(key: string, defaultValue: LLMProviderType): LLMProviderType {
  const value = process.env[key];
  return value === 'openai' || value === 'anthropic' ? value : defaultValue;
}

function getEnvLogLevel(key: string, defaultValue: LogLevel): LogLevel {
  const value = process.env[key]?.toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : defaultValue;
}

export function loadConfig(): Config {
  const dataDir = getEnvString('DATA_DIR', './data');

  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),
    logLevel: getEnvLogLevel('LOG_LEVEL', 'info'),

    // LLM
    llmProvider: getEnvProvider('LLM_PROVIDER', 'anthropic'),
    llmMaxTokens: getEnvNumber('LLM_MAX_TOKENS', 1000),
    llmMaxRetries: getEnvNumber('LLM_MAX_RETRIES', 2),

    // Anthropic
    anthropicApiKey: getEnvString('ANTHROPIC_API_KEY'),
    anthropicModel: getEnvString('ANTHROPIC_MODEL', 'claude-3-5-sonnet-latest'),
    anthropicBaseUrl: getEnvString('ANTHROPIC_BASE_URL'),

    // OpenAI
    openaiApiKey: getEnvString('OPENAI_API_KEY'),
    openaiApiBase: getEnvString('OPENAI_API_BASE', 'https://api.openai.com/v1'),
    openaiModel: getEnvString('OPENAI_MODEL', 'gpt-4o'),

    // Translation defaults
    contextRadius: getEnvNumber('CONTEXT_RADIUS', 20),
    guideMaxEntries: getEnvNumber('GUIDE_MAX_ENTRIES', 100),
    compareMaxEntries: getEnvNumber('COMPARE_MAX_ENTRIES', 10),

    // File paths
    dataDir,
    outputsDir: getEnvString('OUTPUTS_DIR', `${dataDir}/outputs`),

    // Uploads
    maxFileSize: getEnvNumber('MAX_FILE_SIZE', 10485760), // 10MB
  };
}

export const config = loadConfig();
