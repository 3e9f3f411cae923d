import { describe, it, expect, beforeEach } from 'vitest';
import { CostTracker } from '../../../src/cost/tracker.js';
import { DEFAULT_MODEL_PRICING } from '../../../src/core/types.js';
import { ConfigurationError } from '../../../src/core/errors.js';
import { MemoryInsightStore } from '../../../src/storage/memory-store.js';

describe('CostTracker', () => {
  let store: MemoryInsightStore;
  let now: Date;
  let tracker: CostTracker;

  beforeEach(() => {
    store = new MemoryInsightStore();
    now = new Date('2026-03-10T12:00:00.000Z');
    tracker = new CostTracker(store, DEFAULT_MODEL_PRICING, () => now);
  });

  async function recordAt(
    iso: string,
    feature: string,
    inputTokens: number,
    outputTokens: number,
    model = 'gpt-4o-mini',
  ): Promise<void> {
    now = new Date(iso);
    await tracker.record({ feature, model, inputTokens, outputTokens, outcome: 'success' });
  }

  it('record() prices the call and appends it to the store', async () => {
    const record = await tracker.record({
      feature: 'daily_brief',
      model: 'gpt-4o-mini',
      inputTokens: 1000,
      outputTokens: 500,
      outcome: 'success',
    });

    expect(record).toMatchObject({
      feature: 'daily_brief',
      totalTokens: 1500,
      costUsd: 0.00045,
      outcome: 'success',
      timestamp: '2026-03-10T12:00:00.000Z',
    });
    expect(record.id).toHaveLength(12);
    expect(await store.listTokenUsage()).toEqual([record]);
  });

  it('build() records zero cost for an unpriced model without storing', async () => {
    const record = tracker.build({
      feature: 'daily_brief',
      model: 'llama3.2',
      inputTokens: 10,
      outputTokens: 10,
      outcome: 'success',
    });

    expect(record.costUsd).toBe(0);
    expect(await store.listTokenUsage()).toEqual([]);
  });

  it('assertPriced() throws for models missing from the table', () => {
    expect(() => tracker.assertPriced('gpt-4o-mini')).not.toThrow();
    expect(() => tracker.assertPriced('llama3.2')).toThrow(ConfigurationError);
  });

  describe('aggregates', () => {
    beforeEach(async () => {
      await recordAt('2026-01-01T09:00:00.000Z', 'daily_brief', 1000, 500, 'claude-3-5-haiku');
      await recordAt('2026-03-09T07:00:00.000Z', 'daily_brief', 1000, 500);
      await recordAt('2026-03-10T07:00:00.000Z', 'weekly_review', 2000, 1000);
      await recordAt('2026-03-10T07:05:00.000Z', 'daily_brief', 1000, 500);
      now = new Date('2026-03-10T12:00:00.000Z');
    });

    it('report() totals calls inside the period', async () => {
      const report = await tracker.report(30);

      expect(report.periodDays).toBe(30);
      expect(report.since).toBe('2026-02-08T12:00:00.000Z');
      expect(report.totals).toEqual({
        calls: 3,
        inputTokens: 4000,
        outputTokens: 2000,
        totalTokens: 6000,
        costUsd: 0.0018,
      });
      expect(report.mostUsedModel).toBe('gpt-4o-mini');
    });

    it('byFeature() groups and averages per feature', async () => {
      const features = await tracker.byFeature(30);

      expect(features.map(f => f.feature)).toEqual(['daily_brief', 'weekly_review']);
      expect(features[0]).toMatchObject({
        calls: 2,
        totalTokens: 3000,
        costUsd: 0.0009,
        avgTokensPerCall: 1500,
        avgCostPerCall: 0.00045,
      });
    });

    it('byDay() groups by UTC date', async () => {
      expect(await tracker.byDay(30)).toEqual([
        { date: '2026-03-09', calls: 1, totalTokens: 1500, costUsd: 0.00045 },
        { date: '2026-03-10', calls: 2, totalTokens: 4500, costUsd: 0.00135 },
      ]);
    });

    it('recent() lists the newest records first', async () => {
      const recent = await tracker.recent(2);
      expect(recent.map(r => r.timestamp)).toEqual(['2026-03-10T07:05:00.000Z', '2026-03-10T07:00:00.000Z']);
    });

    it('sessionTotals counts everything this tracker appended', () => {
      expect(tracker.sessionTotals.calls).toBe(4);
    });
  });
});
