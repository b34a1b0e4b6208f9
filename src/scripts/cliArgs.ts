import { parseArgs } from 'util';
import { LLMProviderType } from '../llm/types';

export const USAGE = `Usage:
  npm run translate -- <file.srt> [--provider openai|anthropic] [--no-merge] [--fps 60]
                       [--batch-size 10] [--out <dir>]
  npm run merge -- <source.srt> <translated.srt> [--out <dir>]`;

export type CliCommand =
  | {
      kind: 'translate';
      inputPath: string;
      provider?: LLMProviderType;
      mergeLines: boolean;
      fps?: number;
      batchSize?: number;
      outputDir?: string;
    }
  | { kind: 'merge'; sourcePath: string; translatedPath: string; outputDir?: string }
  | { kind: 'help' };

function parsePositiveInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`--${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parsePositiveNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`--${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

function parseProvider(value: string | undefined): LLMProviderType | undefined {
  if (value === undefined) return undefined;
  if (value === 'openai' || value === 'anthropic') return value;
  throw new Error(`--provider must be openai or anthropic, got "${value}"`);
}

/**
 * Parses command-line arguments (without the node and script entries)
 * @throws Error on unknown flags or a wrong number of files
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      merge: { type: 'boolean', default: false },
      'no-merge': { type: 'boolean', default: false },
      provider: { type: 'string' },
      fps: { type: 'string' },
      'batch-size': { type: 'string' },
      out: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    return { kind: 'help' };
  }

  if (values.merge) {
    const [sourcePath, translatedPath, ...rest] = positionals;
    if (!sourcePath || !translatedPath || rest.length > 0) {
      throw new Error('--merge takes exactly two files: <source.srt> <translated.srt>');
    }
    return { kind: 'merge', sourcePath, translatedPath, outputDir: values.out };
  }

  const [inputPath, ...rest] = positionals;
  if (!inputPath || rest.length > 0) {
    throw new Error('Expected exactly one subtitle file');
  }

  return {
    kind: 'translate',
    inputPath,
    provider: parseProvider(values.provider),
    mergeLines: !values['no-merge'],
    fps: parsePositiveNumber('fps', values.fps),
    batchSize: parsePositiveInteger('batch-size', values['batch-size']),
    outputDir: values.out,
  };
}
