import { describe, it, expect } from 'vitest';
import { createProvider, resolveModel } from '../../../src/providers/registry.js';
import { AnthropicProvider } from '../../../src/providers/anthropic.js';
import { OpenAIProvider } from '../../../src/providers/openai.js';
import { BaseLLMProvider } from '../../../src/providers/base.js';
import type { LLMRequest, LLMResponse } from '../../../src/providers/types.js';
import { LLMProviderError } from '../../../src/core/errors.js';
import { resolveConfig } from '../../../src/core/types.js';

class EchoProvider extends BaseLLMProvider {
  readonly name = 'echo';
  readonly defaultModel = 'echo-1';
  lastModel: string | null = null;

  async isAvailable(): Promise<boolean> {
    return true;
  }

  protected async _complete(request: LLMRequest & { model: string }): Promise<LLMResponse> {
    this.lastModel = request.model;
    const text = request.messages.map(m => m.content).join(' ');
    if (text === 'boom') throw new Error('socket hang up');
    return {
      content: text,
      model: request.model,
      usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
      finishReason: 'stop',
    };
  }
}

describe('createProvider', () => {
  it('builds the OpenAI provider by default', async () => {
    const provider = createProvider(resolveConfig({ providers: { openaiApiKey: 'test-secret' } }));

    expect(provider).toBeInstanceOf(OpenAIProvider);
    expect(await provider.isAvailable()).toBe(true);
  });

  it('builds the Anthropic provider when selected', async () => {
    const provider = createProvider(resolveConfig({ providers: { default: 'anthropic' } }));

    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.name).toBe('anthropic');
    expect(await provider.isAvailable()).toBe(false);
  });
});

describe('resolveModel', () => {
  it('prefers the configured model', () => {
    const config = resolveConfig({ providers: { model: 'gpt-4o' } });
    expect(resolveModel(new OpenAIProvider(), config)).toBe('gpt-4o');
  });

  it('falls back to the provider default', () => {
    expect(resolveModel(new AnthropicProvider(), resolveConfig({}))).toBe('claude-3-5-haiku-latest');
  });
});

describe('BaseLLMProvider', () => {
  it('uses the configured default model when the request names none', async () => {
    const provider = new EchoProvider({ defaultModel: 'echo-2' });
    const response = await provider.complete({ messages: [{ role: 'user', content: 'hi' }] });

    expect(response.content).toBe('hi');
    expect(provider.lastModel).toBe('echo-2');
  });

  it('wraps failures in LLMProviderError', async () => {
    const provider = new EchoProvider();
    const error = await provider
      .complete({ messages: [{ role: 'user', content: 'boom' }], model: 'echo-1' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMProviderError);
    expect(error).toMatchObject({ message: 'echo request failed: socket hang up' });
  });
});
