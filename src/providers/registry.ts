import type { LLMProvider } from './types.js';
import type { VitalsenseConfig } from '../core/types.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';
import { getLogger } from '../core/logger.js';

export type ProviderName = VitalsenseConfig['providers']['default'];

/**
 * Build the configured provider. Credentials are not checked here; the
 * gateway does that on first use or in its health check.
 */
export function createProvider(config: VitalsenseConfig): LLMProvider {
  const { providers } = config;
  const logger = getLogger();

  switch (providers.default) {
    case 'anthropic':
      logger.debug({ provider: 'anthropic', model: providers.model }, 'Provider selected');
      return new AnthropicProvider({
        apiKey: providers.anthropicApiKey,
        baseUrl: providers.baseUrl,
        defaultModel: providers.model,
      });
    case 'openai':
      logger.debug({ provider: 'openai', model: providers.model }, 'Provider selected');
      return new OpenAIProvider({
        apiKey: providers.openaiApiKey,
        baseUrl: providers.baseUrl,
        defaultModel: providers.model,
      });
  }
}

/**
 * Model id a provider will be called with
 */
export function resolveModel(provider: LLMProvider, config: VitalsenseConfig): string {
  return config.providers.model || provider.defaultModel;
}
