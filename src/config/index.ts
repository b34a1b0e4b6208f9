import dotenv from 'dotenv';
import path from 'path';
import type { LLMProviderType } from '../llm/types';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // OpenAI
  openaiApiKey: string;
  openaiApiBase: string;
  openaiModel: string;

  // Anthropic
  anthropicApiKey: string;
  anthropicModel: string;

  // Translation
  translationProvider: LLMProviderType;
  translationBatchSize: number;
  translationMaxAttempts: number;
  translationTimeoutMs: number;
  promptsDir: string;

  // Subtitle processing
  subtitleFps: number;
  mergeCjkThreshold: number;
  assSourceFontSize: number;
  assTargetFontSize: number;

  // File paths
  dataDir: string;
  uploadsDir: string;
  outputsDir: string;
  jobsDir: string;

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

// Frame rates such as 23.976 are fractional
function getEnvFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}

function getEnvProvider(key: string, defaultValue: LLMProviderType): LLMProviderType {
  const value = process.env[key]?.toLowerCase();
  if (value === 'openai' || value === 'anthropic') return value;
  return defaultValue;
}

export function loadConfig(): Config {
  const dataDir = getEnvString('DATA_DIR', './data');

  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    // OpenAI
    openaiApiKey: getEnvString('OPENAI_API_KEY'),
    openaiApiBase: getEnvString('OPENAI_API_BASE', 'https://api.openai.com/v1'),
    openaiModel: getEnvString('OPENAI_MODEL', 'gpt-4o-mini'),

    // Anthropic
    anthropicApiKey: getEnvString('ANTHROPIC_API_KEY'),
    anthropicModel: getEnvString('ANTHROPIC_MODEL', 'claude-sonnet-4-20250514'),

    // Translation
    translationProvider: getEnvProvider('TRANSLATION_PROVIDER', 'openai'),
    translationBatchSize: getEnvNumber('TRANSLATION_BATCH_SIZE', 10),
    translationMaxAttempts: getEnvNumber('TRANSLATION_MAX_ATTEMPTS', 5),
    translationTimeoutMs: getEnvNumber('TRANSLATION_TIMEOUT_MS', 120000),
    promptsDir: getEnvString('PROMPTS_DIR', path.resolve(__dirname, '../../prompts')),

    // Subtitle processing
    subtitleFps: getEnvFloat('SUBTITLE_FPS', 60),
    mergeCjkThreshold: getEnvNumber('MERGE_CJK_THRESHOLD', 20),
    assSourceFontSize: getEnvNumber('ASS_SOURCE_FONT_SIZE', 13),
    assTargetFontSize: getEnvNumber('ASS_TARGET_FONT_SIZE', 17),

    // File paths
    dataDir,
    uploadsDir: getEnvString('UPLOADS_DIR', `${dataDir}/uploads`),
    outputsDir: getEnvString('OUTPUTS_DIR', `${dataDir}/outputs`),
    jobsDir: getEnvString('JOBS_DIR', `${dataDir}/jobs`),

    // Uploads
    maxFileSize: getEnvNumber('MAX_FILE_SIZE', 20971520), // 20MB
  };
}

export const config = loadConfig();
