import { LLMProviderType, TranslationProvider } from './types';
import { OpenAITranslationProvider } from './openaiProvider';
import { AnthropicTranslationProvider } from './anthropicProvider';
import { config, Config } from '../config';

/**
 * Provider credentials and models, as read from the environment
 */
export type ProviderSettings = Pick<
  Config,
  | 'openaiApiKey'
  | 'openaiApiBase'
  | 'openaiModel'
  | 'anthropicApiKey'
  | 'anthropicModel'
  | 'translationTimeoutMs'
>;

/**
 * Factory function to create translation providers
 * @throws ConfigurationError when the provider's API key is missing
 */
export function createTranslationProvider(
  providerType: LLMProviderType,
  settings: ProviderSettings = config
): TranslationProvider {
  switch (providerType) {
    case 'openai':
      console.info(`Creating OpenAI translation provider with model: ${settings.openaiModel}`);
      return new OpenAITranslationProvider({
        type: 'openai',
        apiKey: settings.openaiApiKey,
        model: settings.openaiModel,
        apiBase: settings.openaiApiBase,
        timeoutMs: settings.translationTimeoutMs,
      });

    case 'anthropic':
      console.info(`Creating Anthropic translation provider with model: ${settings.anthropicModel}`);
      return new AnthropicTranslationProvider({
        type: 'anthropic',
        apiKey: settings.anthropicApiKey,
        model: settings.anthropicModel,
        timeoutMs: settings.translationTimeoutMs,
      });

    default:
      throw new Error(`Unknown translation provider type: ${providerType as string}`);
  }
}

/**
 * Tests all configured providers and returns availability
 */
export async function testAllProviders(
  settings: ProviderSettings = config
): Promise<Map<LLMProviderType, boolean>> {
  const results = new Map<LLMProviderType, boolean>();

  const providers: LLMProviderType[] = ['openai', 'anthropic'];

  for (const providerType of providers) {
    try {
      const provider = createTranslationProvider(providerType, settings);
      const isAvailable = await provider.testConnection();
      results.set(providerType, isAvailable);
    } catch {
      results.set(providerType, false);
    }
  }

  return results;
}
