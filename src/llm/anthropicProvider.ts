import Anthropic from '@anthropic-ai/sdk';
import { LLMProviderConfig, TranslationProvider } from './types';
import { ConfigurationError } from '../errors';

export class AnthropicTranslationProvider implements TranslationProvider {
  readonly type = 'anthropic' as const;
  private client: Anthropic;
  private model: string;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'anthropic') {
      throw new Error('Invalid config type for AnthropicTranslationProvider');
    }
    if (!config.apiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY is not set');
    }

    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 0,
      timeout: config.timeoutMs,
    });
    this.model = config.model ?? 'claude-sonnet-4-20250514';
  }

  async testConnection(): Promise<boolean> {
    try {
      // Simple test message
      await this.client.messages.create({
        model: this.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch {
      return false;
    }
  }

  async translate(systemPrompt: string, userPayload: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: 8000,
      temperature: 0.3,
      system: systemPrompt,
      messages: [
        {
          role: 'user',
          content: userPayload,
        },
      ],
    });

    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      throw new Error('No text response from Anthropic');
    }

    // Strip code fences the model sometimes wraps around the listing
    const content = textBlock.text.replace(/```[a-z]*\n?/g, '');

    return content.trim();
  }
}
