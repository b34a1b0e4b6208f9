import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { loadSystemPrompt, TRANSLATE_PROMPT_FILE } from './prompts';
import { ConfigurationError } from '../errors';

describe('loadSystemPrompt', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'prompts-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should load and trim the template', async () => {
    fs.writeFileSync(path.join(tmpDir, TRANSLATE_PROMPT_FILE), '\nTranslate these lines.\n\n');

    await expect(loadSystemPrompt(tmpDir)).resolves.toBe('Translate these lines.');
  });

  it('should reject a missing template', async () => {
    await expect(loadSystemPrompt(tmpDir)).rejects.toThrow(ConfigurationError);
  });

  it('should reject an empty template', async () => {
    fs.writeFileSync(path.join(tmpDir, TRANSLATE_PROMPT_FILE), '  \n');

    await expect(loadSystemPrompt(tmpDir)).rejects.toThrow('Prompt template is empty');
  });

  it('should ship a usable default template', async () => {
    const prompt = await loadSystemPrompt(path.resolve(__dirname, '../../prompts'));

    expect(prompt.startsWith('You are a professional subtitle translator.')).toBe(true);
  });
});
