import { describe, it, expect, beforeEach } from 'vitest';
import { LLMGateway } from '../../../src/gateway/llm-gateway.js';
import { DAILY_BRIEF_FALLBACK, ENERGY_PREDICTION_FALLBACK } from '../../../src/gateway/fallbacks.js';
import { payloadOf } from '../../../src/gateway/types.js';
import { CostTracker } from '../../../src/cost/tracker.js';
import {
  ConfigurationError,
  LLMProviderError,
  LLMTimeoutError,
  ParseError,
} from '../../../src/core/errors.js';
import { PromptContextBuilder } from '../../../src/prompt/context-builder.js';
import type { DailyBriefContext, EnergyPredictionContext } from '../../../src/prompt/types.js';
import { MemoryInsightStore } from '../../../src/storage/memory-store.js';
import { MockProvider } from '../../helpers/mock-provider.js';
import {
  DEFAULT_PERSONALIZATION,
  TEST_MODEL,
  clockAt,
  sleepReadinessWeek,
  testConfig,
} from '../../helpers/fixtures.js';

class FailingUsageStore extends MemoryInsightStore {
  async appendTokenUsage(): Promise<void> {
    throw new Error('disk full');
  }
}

const builder = new PromptContextBuilder();
const BRIEF_INPUT = {
  date: '2026-03-08',
  series: sleepReadinessWeek(),
  patterns: [],
  personalization: DEFAULT_PERSONALIZATION,
  calendar: null,
  lookbackDays: 7,
};

function briefContext(): DailyBriefContext {
  return builder.buildDailyBrief(BRIEF_INPUT);
}

function energyContext(): EnergyPredictionContext {
  return builder.buildEnergyPrediction({ ...BRIEF_INPUT, regression: null });
}

describe('LLMGateway', () => {
  let store: MemoryInsightStore;
  let provider: MockProvider;
  let gateway: LLMGateway;

  function createGateway(model = TEST_MODEL, usageStore: MemoryInsightStore = store): LLMGateway {
    const config = testConfig();
    const tracker = new CostTracker(usageStore, config.pricing, clockAt('2026-03-08T07:00:00.000Z'));
    return new LLMGateway({ provider, tracker, config: config.gateway, model });
  }

  beforeEach(() => {
    store = new MemoryInsightStore();
    provider = MockProvider.replying('Sleep held steady this week. Keep the same bedtime tonight.');
    gateway = createGateway();
  });

  it('returns the parsed text and records priced usage on success', async () => {
    const result = await gateway.complete('daily_brief_coach', briefContext());

    expect(result.status).toBe('success');
    expect(payloadOf(result)).toBe('Sleep held steady this week. Keep the same bedtime tonight.');
    expect(result.usage).toMatchObject({
      feature: 'daily_brief',
      model: TEST_MODEL,
      inputTokens: 100,
      outputTokens: 50,
      totalTokens: 150,
      costUsd: 0.000045,
      outcome: 'success',
      timestamp: '2026-03-08T07:00:00.000Z',
    });
    expect(await store.listTokenUsage()).toEqual([result.usage]);
  });

  it('sends the persona prompts with the feature token limit', async () => {
    await gateway.complete('daily_brief_coach', briefContext());

    const [request] = provider.calls;
    expect(request.model).toBe(TEST_MODEL);
    expect(request.maxTokens).toBe(300);
    expect(request.temperature).toBe(0.7);
    expect(request.messages.map(m => m.role)).toEqual(['system', 'user']);
    expect(request.messages[1].content).toContain('- Sleep duration: 7.1 h (+0.3 h vs 7-day avg)');
  });

  it('falls back on timeout and records a zero-token call', async () => {
    provider = new MockProvider([{ kind: 'hang' }]);
    gateway = createGateway();

    const result = await gateway.complete('daily_brief_coach', briefContext(), undefined, 0.05);

    expect(result.status).toBe('failure');
    if (result.status !== 'failure') return;
    expect(result.reason).toBe('timeout');
    expect(result.error).toBeInstanceOf(LLMTimeoutError);
    expect(result.fallback).toBe(DAILY_BRIEF_FALLBACK);
    expect(result.raw).toBeNull();
    expect(result.usage).toMatchObject({ inputTokens: 0, outputTokens: 0, costUsd: 0, outcome: 'timeout' });
    expect(provider.calls[0].signal?.aborted).toBe(true);
  });

  it('falls back on provider errors', async () => {
    provider = new MockProvider([{ kind: 'fail', error: new Error('503 Service Unavailable') }]);
    gateway = createGateway();

    const result = await gateway.complete('daily_brief_coach', briefContext());

    expect(result.status).toBe('failure');
    if (result.status !== 'failure') return;
    expect(result.reason).toBe('provider_error');
    expect(result.error).toBeInstanceOf(LLMProviderError);
    expect(result.error.message).toBe('503 Service Unavailable');
    expect((await store.listTokenUsage())[0].outcome).toBe('provider_error');
  });

  it('falls back on output that fails validation but keeps the raw text and tokens', async () => {
    provider = MockProvider.replying('I think you will feel fine.');
    gateway = createGateway();

    const result = await gateway.complete('energy_predictor', energyContext());

    expect(result.status).toBe('failure');
    if (result.status !== 'failure') return;
    expect(result.reason).toBe('parse_error');
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.raw).toBe('I think you will feel fine.');
    expect(result.fallback).toEqual(ENERGY_PREDICTION_FALLBACK);
    expect(result.usage).toMatchObject({ inputTokens: 100, outputTokens: 50, outcome: 'parse_error' });
  });

  it('parses fenced JSON for structured personas', async () => {
    provider = MockProvider.replying(
      'Here you go:\n```json\n{"overall": 7, "peakHours": ["9-11"], "suggestion": "Front-load focus work."}\n```',
    );
    gateway = createGateway();

    const result = await gateway.complete('energy_predictor', energyContext());

    expect(result.status).toBe('success');
    expect(payloadOf(result)).toEqual({
      overall: 7,
      peakHours: ['9-11'],
      lowHours: [],
      suggestion: 'Front-load focus work.',
    });
    expect(provider.calls[0].temperature).toBe(0.3);
  });

  it('throws ConfigurationError without credentials and never calls the provider', async () => {
    provider.available = false;

    await expect(gateway.complete('daily_brief_coach', briefContext())).rejects.toThrow(ConfigurationError);
    expect(provider.calls).toHaveLength(0);
  });

  it('throws ConfigurationError for a model without pricing', async () => {
    gateway = createGateway('unpriced-model');

    await expect(gateway.healthCheck()).rejects.toThrow(ConfigurationError);
    await expect(gateway.complete('daily_brief_coach', briefContext())).rejects.toThrow(/No pricing entry/);
  });

  it('reports health for a configured provider', async () => {
    expect(await gateway.healthCheck()).toEqual({ provider: 'mock', model: TEST_MODEL, ok: true });
  });

  it('still returns the result when usage cannot be stored', async () => {
    gateway = createGateway(TEST_MODEL, new FailingUsageStore());

    const result = await gateway.complete('daily_brief_coach', briefContext());
    expect(result.status).toBe('success');
    expect(result.usage.costUsd).toBe(0.000045);
  });
});
