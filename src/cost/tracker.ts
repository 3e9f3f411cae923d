import { nanoid } from 'nanoid';
import { getLogger } from '../core/logger.js';
import type { UsageStore } from '../storage/types.js';
import { calculateModelCost, requireModelRate, resolveModelRate, type PricingTable } from './pricing.js';
import type {
  DailyUsage,
  FeatureUsage,
  TokenUsageRecord,
  UsageOutcome,
  UsageReport,
  UsageTotals,
} from './types.js';

const MS_PER_DAY = 86_400_000;

export interface UsageParams {
  feature: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  outcome: UsageOutcome;
}

function emptyTotals(): UsageTotals {
  return { calls: 0, inputTokens: 0, outputTokens: 0, totalTokens: 0, costUsd: 0 };
}

function addTo(totals: UsageTotals, record: TokenUsageRecord): void {
  totals.calls++;
  totals.inputTokens += record.inputTokens;
  totals.outputTokens += record.outputTokens;
  totals.totalTokens += record.totalTokens;
  totals.costUsd += record.costUsd;
}

function roundUsd(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Records token usage and cost per LLM call into the store, and answers
 * aggregate queries over it.
 */
export class CostTracker {
  private logger = getLogger().child({ component: 'cost-tracker' });
  private session = emptyTotals();

  constructor(
    private readonly store: UsageStore,
    private readonly pricing: PricingTable,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Throws ConfigurationError when `model` has no pricing entry
   */
  assertPriced(model: string): void {
    requireModelRate(model, this.pricing);
  }

  /**
   * Price a call without storing it
   */
  build(params: UsageParams): TokenUsageRecord {
    const rate = resolveModelRate(params.model, this.pricing);
    if (!rate && params.inputTokens + params.outputTokens > 0) {
      this.logger.warn({ model: params.model }, 'No pricing entry; recording zero cost');
    }

    return {
      id: nanoid(12),
      feature: params.feature,
      model: params.model,
      inputTokens: params.inputTokens,
      outputTokens: params.outputTokens,
      totalTokens: params.inputTokens + params.outputTokens,
      costUsd: rate ? calculateModelCost(rate, params.inputTokens, params.outputTokens) : 0,
      outcome: params.outcome,
      timestamp: this.clock().toISOString(),
    };
  }

  /**
   * Append one usage row
   */
  async record(params: UsageParams): Promise<TokenUsageRecord> {
    return this.append(this.build(params));
  }

  async append(record: TokenUsageRecord): Promise<TokenUsageRecord> {
    await this.store.appendTokenUsage(record);
    addTo(this.session, record);
    this.logger.debug({ record }, 'Token usage recorded');
    return record;
  }

  /**
   * Totals for calls recorded by this tracker instance
   */
  get sessionTotals(): UsageTotals {
    return { ...this.session, costUsd: roundUsd(this.session.costUsd) };
  }

  async byFeature(days = 30): Promise<FeatureUsage[]> {
    const records = await this.since(days);
    const groups = new Map<string, UsageTotals>();
    for (const record of records) {
      const totals = groups.get(record.feature) ?? emptyTotals();
      addTo(totals, record);
      groups.set(record.feature, totals);
    }

    return [...groups.entries()]
      .map(([feature, totals]) => ({
        feature,
        ...totals,
        costUsd: roundUsd(totals.costUsd),
        avgTokensPerCall: Math.round(totals.totalTokens / totals.calls),
        avgCostPerCall: roundUsd(totals.costUsd / totals.calls),
      }))
      .sort((a, b) => b.costUsd - a.costUsd || a.feature.localeCompare(b.feature));
  }

  async byDay(days = 30): Promise<DailyUsage[]> {
    const records = await this.since(days);
    const groups = new Map<string, DailyUsage>();
    for (const record of records) {
      const date = record.timestamp.slice(0, 10);
      const day = groups.get(date) ?? { date, calls: 0, totalTokens: 0, costUsd: 0 };
      day.calls++;
      day.totalTokens += record.totalTokens;
      day.costUsd += record.costUsd;
      groups.set(date, day);
    }

    return [...groups.values()]
      .map(day => ({ ...day, costUsd: roundUsd(day.costUsd) }))
      .sort((a, b) => a.date.localeCompare(b.date));
  }

  async report(days = 30): Promise<UsageReport> {
    const records = await this.since(days);
    const totals = emptyTotals();
    const modelCalls = new Map<string, number>();
    for (const record of records) {
      addTo(totals, record);
      modelCalls.set(record.model, (modelCalls.get(record.model) ?? 0) + 1);
    }

    let mostUsedModel: string | null = null;
    let mostCalls = 0;
    for (const [model, calls] of modelCalls) {
      if (calls > mostCalls) {
        mostUsedModel = model;
        mostCalls = calls;
      }
    }

    return {
      periodDays: days,
      since: this.cutoff(days),
      totals: { ...totals, costUsd: roundUsd(totals.costUsd) },
      byFeature: await this.byFeature(days),
      byDay: await this.byDay(days),
      mostUsedModel,
    };
  }

  async recent(limit = 20): Promise<TokenUsageRecord[]> {
    const records = await this.store.listTokenUsage();
    return records
      .sort((a, b) => b.timestamp.localeCompare(a.timestamp))
      .slice(0, limit);
  }

  private cutoff(days: number): string {
    return new Date(this.clock().getTime() - days * MS_PER_DAY).toISOString();
  }

  private since(days: number): Promise<TokenUsageRecord[]> {
    return this.store.listTokenUsage({ since: this.cutoff(days) });
  }
}
