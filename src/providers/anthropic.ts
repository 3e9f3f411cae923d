import Anthropic from '@anthropic-ai/sdk';
import { BaseLLMProvider } from './base.js';
import type { LLMRequest, LLMResponse, ProviderConfig } from './types.js';

export class AnthropicProvider extends BaseLLMProvider {
  readonly name = 'anthropic';
  readonly defaultModel = 'claude-3-5-haiku-latest';

  private client: Anthropic | null = null;

  constructor(config: ProviderConfig = {}) {
    super(config);
  }

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({
        apiKey: this.config.apiKey,
        ...(this.config.baseUrl ? { baseURL: this.config.baseUrl } : {}),
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async isAvailable(): Promise<boolean> {
    return !!this.config.apiKey;
  }

  protected async _complete(request: LLMRequest & { model: string }): Promise<LLMResponse> {
    const system = request.messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    const messages: Anthropic.MessageParam[] = request.messages
      .filter(m => m.role !== 'system')
      .map((m): Anthropic.MessageParam => ({
        role: m.role === 'assistant' ? 'assistant' : 'user',
        content: m.content,
      }));

    const response = await this.getClient().messages.create(
      {
        model: request.model,
        max_tokens: request.maxTokens || 1024,
        messages,
        ...(system ? { system } : {}),
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      },
      request.signal ? { signal: request.signal } : undefined,
    );

    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }

    return {
      content,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      finishReason: response.stop_reason === 'max_tokens' ? 'length' : 'stop',
    };
  }
}
