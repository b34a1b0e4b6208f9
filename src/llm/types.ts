/**
 * Supported translation provider types
 */
export type LLMProviderType = 'openai' | 'anthropic';

/**
 * Configuration for a translation provider
 */
export interface LLMProviderConfig {
  type: LLMProviderType;
  apiKey: string;
  model?: string;
  apiBase?: string;
  /** Per-request timeout; a timed out request rejects like any other failure */
  timeoutMs?: number;
}

/**
 * The external text-translation service.
 *
 * A provider makes exactly one request per call. It never retries or backs off on its
 * own: the batch translator owns the retry budget.
 */
export interface TranslationProvider {
  /**
   * Provider type identifier
   */
  readonly type: LLMProviderType;

  /**
   * Sends one system prompt / user payload pair and returns the raw response text
   * @throws on transport errors, timeouts and empty responses
   */
  translate(systemPrompt: string, userPayload: string): Promise<string>;

  /**
   * Tests the connection to the provider
   * @returns True if connection is successful
   */
  testConnection(): Promise<boolean>;
}
