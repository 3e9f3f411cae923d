import { getLogger } from '../core/logger.js';
import type { GatewayConfig } from '../core/types.js';
import {
  ConfigurationError,
  LLMProviderError,
  LLMTimeoutError,
  ParseError,
  toError,
} from '../core/errors.js';
import type { CostTracker } from '../cost/tracker.js';
import type { TokenUsageRecord, UsageOutcome } from '../cost/types.js';
import type { LLMProvider, LLMResponse } from '../providers/types.js';
import { withTimeout } from '../utils/timeout.js';
import { PERSONAS } from './personas.js';
import type {
  FailureReason,
  GatewayHealth,
  ParseResult,
  PersonaContexts,
  PersonaId,
  PersonaPayloads,
  PersonaRegistry,
} from './types.js';

export interface LLMGatewayOptions {
  provider: LLMProvider;
  tracker: CostTracker;
  config: GatewayConfig;
  /** Model id; defaults to the provider's */
  model?: string;
  personas?: PersonaRegistry;
}

/**
 * Model-agnostic completion with a hard timeout and typed, degradable output.
 *
 * `complete` never throws for provider trouble: timeouts, provider errors and
 * malformed output all come back as a `failure` carrying the persona's
 * fallback. Missing credentials or pricing are configuration problems and do
 * throw, once, on first use.
 */
export class LLMGateway {
  private logger = getLogger().child({ component: 'llm-gateway' });
  private provider: LLMProvider;
  private tracker: CostTracker;
  private config: GatewayConfig;
  private personas: PersonaRegistry;
  readonly model: string;
  private verified = false;

  constructor(options: LLMGatewayOptions) {
    this.provider = options.provider;
    this.tracker = options.tracker;
    this.config = options.config;
    this.personas = options.personas ?? PERSONAS;
    this.model = options.model || options.provider.defaultModel;
  }

  /**
   * Check credentials and pricing without calling the model
   */
  async healthCheck(): Promise<GatewayHealth> {
    this.verified = false;
    await this.ensureConfigured();
    return { provider: this.provider.name, model: this.model, ok: true };
  }

  async complete<P extends PersonaId>(
    personaId: P,
    context: PersonaContexts[P],
    maxTokens?: number,
    timeoutSeconds?: number,
  ): Promise<ParseResult<PersonaPayloads[P]>> {
    await this.ensureConfigured();

    const persona = this.personas[personaId];
    const feature = persona.feature;
    const tokens = maxTokens ?? this.config.maxTokens[feature];
    const timeoutMs = Math.round((timeoutSeconds ?? this.config.timeoutSeconds) * 1000);
    const { system, user } = persona.render(context);

    const controller = new AbortController();
    let response: LLMResponse;
    try {
      response = await withTimeout(
        this.provider.complete({
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
          model: this.model,
          temperature: persona.temperature,
          maxTokens: tokens,
          signal: controller.signal,
        }),
        timeoutMs,
        () => new LLMTimeoutError(timeoutMs, this.provider.name),
        controller,
      );
    } catch (err) {
      const error = err instanceof LLMTimeoutError || err instanceof LLMProviderError
        ? err
        : new LLMProviderError(toError(err).message, this.provider.name, toError(err));
      const reason: FailureReason = error instanceof LLMTimeoutError ? 'timeout' : 'provider_error';

      const usage = await this.track(feature, this.model, 0, 0, reason);
      this.logger.warn({ persona: personaId, reason, error: error.message }, 'LLM call failed; using fallback');
      return { status: 'failure', reason, raw: null, fallback: persona.fallback(context), error, usage };
    }

    const { inputTokens, outputTokens } = response.usage;
    const model = response.model || this.model;

    let payload: PersonaPayloads[P];
    try {
      payload = persona.parse(response.content, this.config.maxTextLength);
    } catch (err) {
      const error = err instanceof ParseError ? err : new ParseError(toError(err).message, response.content);
      const usage = await this.track(feature, model, inputTokens, outputTokens, 'parse_error');
      this.logger.warn(
        { persona: personaId, error: error.message, raw: response.content },
        'Unparseable LLM output; using fallback',
      );
      return {
        status: 'failure',
        reason: 'parse_error',
        raw: response.content,
        fallback: persona.fallback(context),
        error,
        usage,
      };
    }

    const usage = await this.track(feature, model, inputTokens, outputTokens, 'success');
    this.logger.debug({ persona: personaId, model, inputTokens, outputTokens }, 'LLM call succeeded');
    return { status: 'success', payload, raw: response.content, usage };
  }

  private async ensureConfigured(): Promise<void> {
    if (this.verified) return;

    if (!(await this.provider.isAvailable())) {
      throw new ConfigurationError(
        `No credentials for provider "${this.provider.name}"; set the API key in the config or environment`,
      );
    }
    this.tracker.assertPriced(this.model);
    this.verified = true;
  }

  /**
   * One usage row per call. A store failure is logged and does not turn the
   * call into an error; the priced record is still returned.
   */
  private async track(
    feature: string,
    model: string,
    inputTokens: number,
    outputTokens: number,
    outcome: UsageOutcome,
  ): Promise<TokenUsageRecord> {
    const record = this.tracker.build({ feature, model, inputTokens, outputTokens, outcome });
    try {
      await this.tracker.append(record);
    } catch (err) {
      this.logger.error({ err: toError(err), feature, outcome }, 'Failed to persist token usage');
    }
    return record;
  }
}
