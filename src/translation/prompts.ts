import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../errors';

export const TRANSLATE_PROMPT_FILE = 'translate.md';

/**
 * Loads the fixed system prompt sent with every translation batch
 * @throws ConfigurationError when the template is missing or empty
 */
export async function loadSystemPrompt(promptsDir: string): Promise<string> {
  const promptPath = path.join(promptsDir, TRANSLATE_PROMPT_FILE);

  let template: string;
  try {
    template = await fs.promises.readFile(promptPath, 'utf-8');
  } catch {
    throw new ConfigurationError(`Prompt template not found: ${promptPath}`);
  }

  if (!template.trim()) {
    throw new ConfigurationError(`Prompt template is empty: ${promptPath}`);
  }

  return template.trim();
}
