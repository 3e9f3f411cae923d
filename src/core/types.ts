import { z } from 'zod';

// ===== Configuration =====

export const ModelRateSchema = z.object({
  inputPer1M: z.number().min(0),
  outputPer1M: z.number().min(0),
});

export type ModelRate = z.infer<typeof ModelRateSchema>;

/**
 * Price per 1M tokens. Keys are matched exactly first, then as the longest
 * substring of the model id (so dated snapshots resolve to their family).
 */
export const DEFAULT_MODEL_PRICING: Record<string, ModelRate> = {
  'claude-sonnet-4': { inputPer1M: 3.0, outputPer1M: 15.0 },
  'claude-3-5-haiku': { inputPer1M: 0.8, outputPer1M: 4.0 },
  'claude-3-5-sonnet': { inputPer1M: 3.0, outputPer1M: 15.0 },
  'gpt-4o-mini': { inputPer1M: 0.15, outputPer1M: 0.6 },
  'gpt-4o': { inputPer1M: 2.5, outputPer1M: 10.0 },
};

export const VitalsenseConfigSchema = z.object({
  providers: z.object({
    default: z.enum(['anthropic', 'openai']).default('openai'),
    model: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    openaiApiKey: z.string().optional(),
    baseUrl: z.string().optional(),
  }).default({}),
  gateway: z.object({
    timeoutSeconds: z.number().positive().default(10),
    maxTextLength: z.number().int().min(100).default(2000),
    maxTokens: z.object({
      daily_brief: z.number().int().positive().default(300),
      weekly_review: z.number().int().positive().default(400),
      energy_prediction: z.number().int().positive().default(300),
      pattern_analysis: z.number().int().positive().default(800),
    }).default({}),
  }).default({}),
  pricing: z.record(z.string(), ModelRateSchema).default(DEFAULT_MODEL_PRICING),
  analysis: z.object({
    lookbackDays: z.number().int().min(7).max(90).default(30),
    minSamples: z.number().int().min(3).default(5),
    minCorrelationStrength: z.number().min(0).max(1).default(0.5),
    significanceLevel: z.number().gt(0).lt(1).default(0.05),
    minActionableSampleSize: z.number().int().min(1).default(7),
    minTrendChangePercent: z.number().min(0).default(5),
    minWeekdaySamples: z.number().int().min(2).default(2),
    slidingWindowDays: z.number().int().min(5).default(14),
    windowChangeDays: z.number().int().min(3).default(7),
    minWindowChangePercent: z.number().min(0).default(10),
  }).default({}),
  patterns: z.object({
    strengthDriftTolerance: z.number().min(0).default(0.1),
    confidenceDriftTolerance: z.number().min(0).default(0.1),
    staleAfterRuns: z.number().int().min(1).default(3),
    minRunIntervalHours: z.number().min(0).default(24),
    includeLlm: z.boolean().default(false),
  }).default({}),
  personalization: z.object({
    halfLifeDays: z.number().positive().default(14),
    helpfulIncrement: z.number().positive().default(0.1),
    actedOnIncrement: z.number().positive().default(0.15),
    notHelpfulPenalty: z.number().positive().default(0.15),
    dismissedPenalty: z.number().positive().default(0.25),
    topFocusAreas: z.number().int().min(1).default(3),
    defaultFocusAreas: z.array(z.string()).default(['sleep', 'energy']),
    defaultTone: z.enum(['casual', 'professional', 'concise', 'detailed']).default('casual'),
    defaultLength: z.enum(['short', 'medium', 'long']).default('medium'),
  }).default({}),
  insights: z.object({
    lookbackDays: z.number().int().min(3).max(90).default(7),
    lockTtlSeconds: z.number().positive().default(120),
    weeklyReviewDay: z.enum([
      'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday',
    ]).default('Sunday'),
  }).default({}),
  energy: z.object({
    minTrainingSamples: z.number().int().min(1).default(14),
    minFitSamples: z.number().int().min(2).default(3),
    ridgeLambda: z.number().min(0).default(1e-6),
    historyDays: z.number().int().min(14).max(365).default(180),
  }).default({}),
  storage: z.object({
    path: z.string().optional(),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type VitalsenseConfig = z.infer<typeof VitalsenseConfigSchema>;

export type AnalysisConfig = VitalsenseConfig['analysis'];
export type PatternMergeConfig = VitalsenseConfig['patterns'];
export type PersonalizationConfig = VitalsenseConfig['personalization'];
export type GatewayConfig = VitalsenseConfig['gateway'];
export type EnergyConfig = VitalsenseConfig['energy'];

/**
 * Parse a partial config (or nothing) into a fully defaulted one.
 */
export function resolveConfig(raw: unknown = {}): VitalsenseConfig {
  return VitalsenseConfigSchema.parse(raw);
}
