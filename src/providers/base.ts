import type { LLMProvider, LLMRequest, LLMResponse, ProviderConfig } from './types.js';
import { getLogger } from '../core/logger.js';
import { LLMProviderError, toError } from '../core/errors.js';

/**
 * Shared request path for providers. Calls are made once: the gateway owns
 * the timeout and there are no retries, so a failure surfaces immediately as
 * an LLMProviderError.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly defaultModel: string;

  protected logger = getLogger().child({ component: 'provider' });
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = config;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const model = request.model || this.config.defaultModel || this.defaultModel;
    this.logger.debug({ provider: this.name, model, maxTokens: request.maxTokens }, 'LLM request');

    try {
      return await this._complete({ ...request, model });
    } catch (err) {
      const error = toError(err);
      throw new LLMProviderError(`${this.name} request failed: ${error.message}`, this.name, error);
    }
  }

  abstract isAvailable(): Promise<boolean>;

  protected abstract _complete(request: LLMRequest & { model: string }): Promise<LLMResponse>;
}
