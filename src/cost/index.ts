export { CostTracker } from './tracker.js';
export { calculateModelCost, requireModelRate, resolveModelRate } from './pricing.js';
export type { PricingTable } from './pricing.js';
export type {
  DailyUsage,
  FeatureUsage,
  TokenUsageRecord,
  UsageOutcome,
  UsageReport,
  UsageTotals,
} from './types.js';
