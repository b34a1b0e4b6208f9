import { JobConfig, JobMode } from './types';
import { LLMProviderType } from '../llm/types';

export type JobConfigValidation =
  | { ok: true; config: JobConfig }
  | { ok: false; error: string; details?: Record<string, unknown> };

const MODES: JobMode[] = ['translate', 'merge'];
const PROVIDERS: LLMProviderType[] = ['openai', 'anthropic'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMode(value: unknown): value is JobMode {
  return MODES.some((mode) => mode === value);
}

function isProvider(value: unknown): value is LLMProviderType {
  return PROVIDERS.some((provider) => provider === value);
}

function optionalPositive(
  source: Record<string, unknown>,
  key: string,
  integer: boolean
): { value?: number; error?: string } {
  const raw = source[key];
  if (raw === undefined) return {};
  if (typeof raw !== 'number' || !Number.isFinite(raw) || raw <= 0 || (integer && !Number.isInteger(raw))) {
    return { error: `${key} must be a positive ${integer ? 'integer' : 'number'}` };
  }
  return { value: raw };
}

/**
 * Validates the `config` object of a create-job request body
 */
export function validateJobConfig(input: unknown): JobConfigValidation {
  if (!isRecord(input)) {
    return { ok: false, error: 'Missing config' };
  }

  const { title, mode, llmProvider, mergeLines } = input;

  if (typeof title !== 'string' || !title.trim() || mode === undefined || llmProvider === undefined) {
    return {
      ok: false,
      error: 'Missing required config fields',
      details: { required: ['title', 'mode', 'llmProvider'] },
    };
  }

  if (!isMode(mode)) {
    return { ok: false, error: 'mode must be translate or merge' };
  }

  if (!isProvider(llmProvider)) {
    return { ok: false, error: 'llmProvider must be openai or anthropic' };
  }

  if (mergeLines !== undefined && typeof mergeLines !== 'boolean') {
    return { ok: false, error: 'mergeLines must be a boolean' };
  }

  const config: JobConfig = { title: title.trim(), mode, llmProvider, mergeLines };

  // fps may be fractional (23.976, 29.97)
  for (const key of ['fps', 'batchSize', 'sourceFontSize', 'targetFontSize'] as const) {
    const { value, error } = optionalPositive(input, key, key !== 'fps');
    if (error) {
      return { ok: false, error };
    }
    config[key] = value;
  }

  return { ok: true, config };
}
