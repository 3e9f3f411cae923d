/**
 * Shared test data builders
 */

import { resolveConfig, type VitalsenseConfig } from '../../src/core/types.js';
import type { MetricData, MetricSeries, PatternRecord } from '../../src/analysis/types.js';
import type { PersonalizationContext } from '../../src/personalization/types.js';
import type { InsightRecord } from '../../src/insights/types.js';
import { PromptContextBuilder } from '../../src/prompt/context-builder.js';
import { addDays } from '../../src/utils/dates.js';

export const TEST_MODEL = 'gpt-4o-mini';

/**
 * Fully defaulted config with a test key and a priced model
 */
export function testConfig(overrides: Record<string, unknown> = {}): VitalsenseConfig {
  return resolveConfig({
    providers: { default: 'openai', model: TEST_MODEL, openaiApiKey: 'test-secret' },
    ...overrides,
  });
}

/**
 * Consecutive daily points starting at `start`; null entries become gaps
 */
export function dailySeries(start: string, values: Array<number | null>): MetricSeries {
  return values.map((value, i) => ({ date: addDays(start, i), value }));
}

/** Sleep and readiness over one week that move together */
export const SLEEP_WEEK = [7.2, 6.8, 5.5, 6.1, 7.4, 7.8, 7.1];
export const READINESS_WEEK = [78, 74, 52, 61, 82, 88, 85];

export function sleepReadinessWeek(start = '2026-03-02'): MetricData {
  return {
    sleep_hours: dailySeries(start, SLEEP_WEEK),
    readiness: dailySeries(start, READINESS_WEEK),
  };
}

/** A fixed clock */
export function clockAt(iso: string): () => Date {
  return () => new Date(iso);
}

/** Personalization with no learned preferences */
export const DEFAULT_PERSONALIZATION: PersonalizationContext = {
  focusAreas: ['sleep', 'energy'],
  toneStyle: 'casual',
  insightLength: 'medium',
  morningPerson: null,
  weights: [],
};

/** A stored, active correlation between sleep and readiness */
export function patternRecord(overrides: Partial<PatternRecord> = {}): PatternRecord {
  return {
    id: 'pattern-1',
    name: 'Strong positive correlation: Readiness score ↔ Sleep duration',
    description: 'Higher readiness score tends to come with higher sleep duration (r=0.97, p=<0.001, n=7)',
    patternType: 'correlation',
    variables: ['readiness', 'sleep_hours'],
    strength: 0.9739,
    confidence: 0.9998,
    sampleSize: 7,
    actionable: true,
    source: 'statistical',
    details: { method: 'pearson', windowDays: 30 },
    active: true,
    discoveredAt: '2026-03-01T08:00:00.000Z',
    ...overrides,
  };
}

/** A stored daily brief for 2026-03-08 */
export function insightRecord(overrides: Partial<InsightRecord> = {}): InsightRecord {
  const context = new PromptContextBuilder().buildDailyBrief({
    date: '2026-03-08',
    series: sleepReadinessWeek(),
    patterns: [],
    personalization: DEFAULT_PERSONALIZATION,
    calendar: null,
    lookbackDays: 7,
  });
  return {
    id: 'insight-1',
    type: 'daily_brief',
    date: '2026-03-08',
    content: 'Sleep held steady. Keep the same bedtime tonight.',
    context,
    confidence: 0.8,
    actedOn: false,
    degraded: false,
    tone: 'casual',
    length: 'short',
    createdAt: '2026-03-08T07:00:00.000Z',
    ...overrides,
  };
}
