export { BaseLLMProvider } from './base.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAIProvider } from './openai.js';
export { createProvider, resolveModel } from './registry.js';
export type { ProviderName } from './registry.js';
export type { LLMMessage, LLMProvider, LLMRequest, LLMResponse, ProviderConfig } from './types.js';
