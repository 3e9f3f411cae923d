import OpenAI from 'openai';
import { BaseLLMProvider } from './base.js';
import type { LLMRequest, LLMResponse, ProviderConfig } from './types.js';

export class OpenAIProvider extends BaseLLMProvider {
  readonly name = 'openai';
  readonly defaultModel = 'gpt-4o-mini';

  private client: OpenAI | null = null;

  constructor(config: ProviderConfig = {}) {
    super(config);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
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
    const messages: OpenAI.ChatCompletionMessageParam[] = request.messages.map((m): OpenAI.ChatCompletionMessageParam => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'assistant':
          return { role: 'assistant', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
      }
    });

    const response = await this.getClient().chat.completions.create(
      {
        model: request.model,
        messages,
        max_tokens: request.maxTokens || 1024,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      },
      request.signal ? { signal: request.signal } : undefined,
    );

    const choice = response.choices[0];
    if (!choice) {
      return {
        content: '',
        model: response.model,
        usage: {
          inputTokens: response.usage?.prompt_tokens || 0,
          outputTokens: response.usage?.completion_tokens || 0,
          totalTokens: response.usage?.total_tokens || 0,
        },
        finishReason: 'error',
      };
    }

    return {
      content: choice.message.content || '',
      model: response.model,
      usage: {
        inputTokens: response.usage?.prompt_tokens || 0,
        outputTokens: response.usage?.completion_tokens || 0,
        totalTokens: response.usage?.total_tokens || 0,
      },
      finishReason: choice.finish_reason === 'length' ? 'length' : 'stop',
    };
  }
}
