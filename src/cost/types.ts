export type UsageOutcome = 'success' | 'parse_error' | 'provider_error' | 'timeout';

export const USAGE_OUTCOMES: readonly UsageOutcome[] = ['success', 'parse_error', 'provider_error', 'timeout'];

/**
 * One row per LLM invocation, whatever its outcome. Append-only.
 */
export interface TokenUsageRecord {
  id: string;
  feature: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd: number;
  outcome: UsageOutcome;
  timestamp: string;
}

export interface UsageTotals {
  calls: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd: number;
}

export interface FeatureUsage extends UsageTotals {
  feature: string;
  avgTokensPerCall: number;
  avgCostPerCall: number;
}

export interface DailyUsage {
  date: string;
  calls: number;
  totalTokens: number;
  costUsd: number;
}

export interface UsageReport {
  periodDays: number;
  since: string;
  totals: UsageTotals;
  byFeature: FeatureUsage[];
  byDay: DailyUsage[];
  mostUsedModel: string | null;
}
