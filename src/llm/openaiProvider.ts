import OpenAI from 'openai';
import { LLMProviderConfig, TranslationProvider } from './types';
import { ConfigurationError } from '../errors';

export class OpenAITranslationProvider implements TranslationProvider {
  readonly type = 'openai' as const;
  private client: OpenAI;
  private model: string;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'openai') {
      throw new Error('Invalid config type for OpenAITranslationProvider');
    }
    if (!config.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is not set');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiBase,
      // Retries are owned by the batch translator
      maxRetries: 0,
      timeout: config.timeoutMs,
    });
    this.model = config.model ?? 'gpt-4o-mini';
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  async translate(systemPrompt: string, userPayload: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        {
          role: 'system',
          content: systemPrompt,
        },
        {
          role: 'user',
          content: userPayload,
        },
      ],
      temperature: 0.3,
      max_tokens: 16384,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty response from OpenAI');
    }

    return content.trim();
  }
}
