import type { AppConfig } from './config.js';
import logger from './logger.js';
import { AnthropicProvider, ZAIProvider, type LLMProvider } from './llm-provider.js';

export interface ProviderSelection {
  provider: LLMProvider;
  model: string;
  maxTokens: number;
}

// ─── Provider factory ────────────────────────────────────────────────

/**
 * Picks the provider from LLM_PROVIDER, or from whichever key is present when
 * it is unset (Z.AI first). Returns null when the chosen provider has no key.
 */
export function createProvider(config: AppConfig['llm']): ProviderSelection | null {
  const providerName = config.provider ?? (config.zaiApiKey ? 'zai' : 'anthropic');

  if (providerName === 'zai') {
    if (!config.zaiApiKey) {
      logger.warn('ZAI_API_KEY is not set, inference disabled');
      return null;
    }
    return {
      provider: new ZAIProvider({ apiKey: config.zaiApiKey, baseUrl: config.zaiBaseUrl }),
      model: config.zaiModel,
      maxTokens: config.maxTokens,
    };
  }

  if (!config.anthropicApiKey) {
    logger.warn('ANTHROPIC_API_KEY is not set, inference disabled');
    return null;
  }
  return {
    provider: new AnthropicProvider(config.anthropicApiKey),
    model: config.anthropicModel,
    maxTokens: config.maxTokens,
  };
}
