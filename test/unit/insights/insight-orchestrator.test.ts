import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InsightOrchestrator, DAILY_BRIEF_CONFIDENCE, WEEKLY_REVIEW_CONFIDENCE } from '../../../src/insights/insight-orchestrator.js';
import { VitalsenseRuntime } from '../../../src/core/runtime.js';
import { ConfigurationError, StorageError, VitalsenseError } from '../../../src/core/errors.js';
import { MemoryInsightStore } from '../../../src/storage/memory-store.js';
import { DAILY_BRIEF_FALLBACK } from '../../../src/gateway/fallbacks.js';
import type { VitalsenseConfig } from '../../../src/core/types.js';
import type { InsightNotification, InsightRecord, InsightType } from '../../../src/insights/types.js';
import type { LLMRequest } from '../../../src/providers/types.js';
import { MockProvider } from '../../helpers/mock-provider.js';
import {
  clockAt,
  dailySeries,
  insightRecord,
  SLEEP_WEEK,
  READINESS_WEEK,
  testConfig,
} from '../../helpers/fixtures.js';

const ENERGY_REPLY = '{"overall": 6, "peakHours": ["9-11"], "lowHours": [], "suggestion": "Walk after lunch."}';

function personaReply(request: LLMRequest): string {
  const system = request.messages[0]?.content ?? '';
  return system.includes('predict') ? ENERGY_REPLY : 'Sleep held steady. Keep the same bedtime tonight.';
}

async function seedWeek(store: MemoryInsightStore): Promise<void> {
  await store.putMetricValues('sleep_hours', dailySeries('2026-03-02', SLEEP_WEEK));
  await store.putMetricValues('readiness', dailySeries('2026-03-02', READINESS_WEEK));
}

class FlakyBriefStore extends MemoryInsightStore {
  override async getInsight(type: InsightType, date: string): Promise<InsightRecord | null> {
    if (type === 'daily_brief') throw new StorageError('disk I/O error');
    return super.getInsight(type, date);
  }
}

describe('InsightOrchestrator', () => {
  let store: MemoryInsightStore;
  let provider: MockProvider;
  let runtime: VitalsenseRuntime;
  let orchestrator: InsightOrchestrator;

  function setup(options: { config?: VitalsenseConfig; clock?: string; store?: MemoryInsightStore } = {}): void {
    store = options.store ?? new MemoryInsightStore();
    runtime = VitalsenseRuntime.create({
      config: options.config ?? testConfig(),
      store,
      provider,
      clock: clockAt(options.clock ?? '2026-03-08T07:00:00.000Z'),
    });
    orchestrator = new InsightOrchestrator(runtime);
  }

  beforeEach(async () => {
    provider = MockProvider.replying('Sleep held steady. Keep the same bedtime tonight.');
    setup();
    await seedWeek(store);
  });

  afterEach(async () => {
    await runtime.shutdown();
  });

  describe('daily brief', () => {
    it('generates and stores a brief from the model reply', async () => {
      const brief = await orchestrator.generateDailyBrief('2026-03-08');

      expect(brief.type).toBe('daily_brief');
      expect(brief.date).toBe('2026-03-08');
      expect(brief.content).toBe('Sleep held steady. Keep the same bedtime tonight.');
      expect(brief.confidence).toBe(DAILY_BRIEF_CONFIDENCE);
      expect(brief.degraded).toBe(false);
      expect(brief.tone).toBe('casual');
      expect(brief.createdAt).toBe('2026-03-08T07:00:00.000Z');
      expect(await store.getInsight('daily_brief', '2026-03-08')).toEqual(brief);
    });

    it('returns the stored brief without calling the model again', async () => {
      const first = await orchestrator.generateDailyBrief('2026-03-08');
      const second = await orchestrator.generateDailyBrief('2026-03-08');

      expect(second.id).toBe(first.id);
      expect(provider.calls).toHaveLength(1);
    });

    it('regenerates on force and records the superseded id', async () => {
      const regenerated: boolean[] = [];
      runtime.events.on('insight:persisted', ({ regenerated: flag }) => regenerated.push(flag));

      const first = await orchestrator.generateDailyBrief('2026-03-08');
      const second = await orchestrator.generateDailyBrief('2026-03-08', { force: true });

      expect(second.id).not.toBe(first.id);
      expect(second.supersedes).toBe(first.id);
      expect(provider.calls).toHaveLength(2);
      expect(regenerated).toEqual([false, true]);
      expect((await store.getInsight('daily_brief', '2026-03-08'))?.id).toBe(second.id);
    });

    it('shares one generation between concurrent callers', async () => {
      const [a, b] = await Promise.all([
        orchestrator.generateDailyBrief('2026-03-08'),
        orchestrator.generateDailyBrief('2026-03-08'),
      ]);

      expect(a.id).toBe(b.id);
      expect(provider.calls).toHaveLength(1);
    });

    it('stores a degraded fallback when the model times out', async () => {
      await runtime.shutdown();
      provider = new MockProvider([{ kind: 'hang' }]);
      setup({ config: testConfig({ gateway: { timeoutSeconds: 0.05 } }) });
      await seedWeek(store);
      const degraded: string[] = [];
      runtime.events.on('insight:degraded', ({ reason }) => degraded.push(reason));

      const brief = await orchestrator.generateDailyBrief('2026-03-08');

      expect(brief.degraded).toBe(true);
      expect(brief.content).toBe(DAILY_BRIEF_FALLBACK);
      expect(brief.confidence).toBe(0);
      expect(brief.fallbackReason).toBe('timeout');
      expect(brief.length).toBe('medium');
      expect(degraded).toEqual(['timeout']);
    });

    it('stops an aborted caller waiting while the generation still completes', async () => {
      await runtime.shutdown();
      provider = new MockProvider([{ kind: 'hang' }]);
      setup({ config: testConfig({ gateway: { timeoutSeconds: 0.05 } }) });
      await seedWeek(store);

      const controller = new AbortController();
      const pending = orchestrator.generateDailyBrief('2026-03-08', { signal: controller.signal });
      controller.abort(new Error('caller left'));
      await expect(pending).rejects.toThrow('caller left');

      const brief = await orchestrator.generateDailyBrief('2026-03-08');
      expect(brief.degraded).toBe(true);
      expect(provider.calls).toHaveLength(1);
    });

    it('rejects malformed dates', async () => {
      await expect(orchestrator.generateDailyBrief('March 8')).rejects.toThrow(RangeError);
    });

    it('raises ConfigurationError when the provider is unavailable', async () => {
      provider.available = false;
      await expect(orchestrator.generateDailyBrief('2026-03-08')).rejects.toThrow(ConfigurationError);
      expect(await store.getInsight('daily_brief', '2026-03-08')).toBeNull();
    });

    it('passes the stored insight to the notifier and survives its failure', async () => {
      await runtime.shutdown();
      const received: InsightNotification[] = [];
      store = new MemoryInsightStore();
      runtime = VitalsenseRuntime.create({
        config: testConfig(),
        store,
        provider,
        clock: clockAt('2026-03-08T07:00:00.000Z'),
        notifier: {
          notify: async notification => {
            received.push(notification);
            throw new Error('push service down');
          },
        },
      });
      orchestrator = new InsightOrchestrator(runtime);
      await seedWeek(store);

      const brief = await orchestrator.generateDailyBrief('2026-03-08');

      expect(received).toEqual([
        {
          type: 'daily_brief',
          date: '2026-03-08',
          confidence: DAILY_BRIEF_CONFIDENCE,
          content: brief.content,
          degraded: false,
        },
      ]);
    });
  });

  describe('weekly review', () => {
    it('reviews the seven days ending on the given date', async () => {
      const review = await orchestrator.generateWeeklyReview('2026-03-08');

      expect(review.type).toBe('weekly_review');
      expect(review.confidence).toBe(WEEKLY_REVIEW_CONFIDENCE);
      expect(review.context).toMatchObject({ weekStart: '2026-03-02', weekEnding: '2026-03-08' });
      expect(provider.calls).toHaveLength(1);
    });

    it('regenerates on force and records the superseded id', async () => {
      const first = await orchestrator.generateWeeklyReview('2026-03-08');
      const second = await orchestrator.generateWeeklyReview('2026-03-08', { force: true });

      expect(second.id).not.toBe(first.id);
      expect(second.supersedes).toBe(first.id);
      expect(provider.calls).toHaveLength(2);
      expect((await store.getInsight('weekly_review', '2026-03-08'))?.id).toBe(second.id);
    });
  });

  describe('energy prediction', () => {
    it('uses the model answer below the training threshold', async () => {
      provider = MockProvider.replying(ENERGY_REPLY);
      await runtime.shutdown();
      setup();
      await seedWeek(store);

      const prediction = await orchestrator.predictEnergy('2026-03-08');

      expect(prediction.source).toBe('llm');
      expect(prediction.overall).toBe(6);
      expect(prediction.confidence).toBe(0.5);
      expect(prediction.insufficientData).toBe(true);
      expect(prediction.sampleSize).toBe(0);

      const stored = await store.getInsight('energy_prediction', '2026-03-08');
      expect(stored?.content).toBe('Expected energy: 6.0/10. Peak: 9-11. Walk after lunch.');
      expect(stored?.degraded).toBe(false);
      expect(stored?.prediction).toEqual({
        source: 'llm',
        overall: 6,
        regression: null,
        llm: 6,
        insufficientData: true,
      });
    });

    it('falls back to a degraded neutral prediction when the model reply is unusable', async () => {
      provider = MockProvider.replying('not json at all');
      await runtime.shutdown();
      setup();
      await seedWeek(store);

      const prediction = await orchestrator.predictEnergy('2026-03-08');

      expect(prediction.overall).toBe(5);
      expect(prediction.confidence).toBe(0);
      expect(prediction.llmFailure).toBe('parse_error');
      const stored = await store.getInsight('energy_prediction', '2026-03-08');
      expect(stored?.degraded).toBe(true);
      expect(stored?.fallbackReason).toBe('parse_error');
    });

    it('uses the regression once enough days are labeled', async () => {
      provider = MockProvider.replying(ENERGY_REPLY);
      await runtime.shutdown();
      setup();
      const days = 21;
      await store.putMetricValues('sleep_hours', dailySeries('2026-02-15', Array.from({ length: days + 1 }, (_, i) => 6 + (i % 4) * 0.5)));
      await store.putMetricValues('readiness', dailySeries('2026-02-15', Array.from({ length: days + 1 }, (_, i) => 60 + ((i * 7) % 20))));
      await store.putMetricValues('energy', dailySeries('2026-02-15', Array.from({ length: days }, (_, i) => 1 + ((i * 3) % 5))));

      const prediction = await orchestrator.predictEnergy('2026-03-08');

      expect(prediction.source).toBe('regression');
      expect(prediction.insufficientData).toBe(false);
      expect(prediction.sampleSize).toBe(days);
      expect(prediction.regression?.predicted).toBe(prediction.overall);

      const stored = await store.getInsight('energy_prediction', '2026-03-08');
      expect(stored?.prediction?.regression).toBe(prediction.overall);
      expect(stored?.prediction?.llm).toBe(6);
    });

    it('uses the model answer without flagging thin data when only the target day lacks features', async () => {
      provider = MockProvider.replying(ENERGY_REPLY);
      await runtime.shutdown();
      setup();
      const days = 21;
      await store.putMetricValues('sleep_hours', dailySeries('2026-02-15', Array.from({ length: days }, (_, i) => 6 + (i % 4) * 0.5)));
      await store.putMetricValues('readiness', dailySeries('2026-02-15', Array.from({ length: days }, (_, i) => 60 + ((i * 7) % 20))));
      await store.putMetricValues('energy', dailySeries('2026-02-15', Array.from({ length: days }, (_, i) => 1 + ((i * 3) % 5))));

      const prediction = await orchestrator.predictEnergy('2026-03-08');

      expect(prediction.source).toBe('llm');
      expect(prediction.insufficientData).toBe(false);
      expect(prediction.sampleSize).toBe(days);
      expect(prediction.regression).toBeNull();
      expect(prediction.overall).toBe(6);
      expect(prediction.confidence).toBe(0.5);

      const stored = await store.getInsight('energy_prediction', '2026-03-08');
      expect(stored?.degraded).toBe(false);
      expect(stored?.prediction).toEqual({
        source: 'llm',
        overall: 6,
        regression: null,
        llm: 6,
        insufficientData: false,
      });
    });

    it('replaces an earlier prediction for the same day', async () => {
      provider = MockProvider.replying(ENERGY_REPLY);
      await runtime.shutdown();
      setup();

      await orchestrator.predictEnergy('2026-03-08');
      const first = await store.getInsight('energy_prediction', '2026-03-08');
      await orchestrator.predictEnergy('2026-03-08');
      const second = await store.getInsight('energy_prediction', '2026-03-08');

      expect(second?.supersedes).toBe(first?.id);
      expect(provider.calls).toHaveLength(2);
    });

    it('scores stored predictions against reported energy', async () => {
      await runtime.shutdown();
      setup({ clock: '2026-03-10T07:00:00.000Z' });
      const snapshots = [
        { date: '2026-03-05', regression: 6, actual: 3 },
        { date: '2026-03-06', regression: 7, actual: 4 },
        { date: '2026-03-07', regression: 8, actual: 4 },
      ];
      for (const [i, s] of snapshots.entries()) {
        await store.putInsight(insightRecord({
          id: `prediction-${i}`,
          type: 'energy_prediction',
          date: s.date,
          prediction: { source: 'regression', overall: s.regression, regression: s.regression, llm: 5, insufficientData: false },
        }));
        await store.putMetricValues('energy', [{ date: s.date, value: s.actual }]);
      }

      const comparison = await orchestrator.compareEnergyPredictions();

      expect(comparison.winner).toBe('regression');
      expect(comparison.regression?.sampleSize).toBe(3);
      expect(comparison.regression?.mae).toBeCloseTo(0.33, 2);
      expect(comparison.llm?.mae).toBeCloseTo(2.33, 2);
    });
  });

  describe('pattern detection', () => {
    it('stores new patterns and records the run', async () => {
      const detected: number[] = [];
      runtime.events.on('patterns:detected', ({ created }) => detected.push(created));

      const active = await orchestrator.detectPatterns();

      expect(active).toHaveLength(1);
      expect(active[0].variables).toEqual(['readiness', 'sleep_hours']);
      expect(await store.listPatterns({ activeOnly: true })).toEqual(active);
      expect((await store.getDetectionState()).runCount).toBe(1);
      expect(detected).toEqual([1]);
    });

    it('returns the stored set when the last run is too recent', async () => {
      const first = await orchestrator.detectPatterns();
      const second = await orchestrator.detectPatterns();

      expect(second).toEqual(first);
      expect((await store.getDetectionState()).runCount).toBe(1);
    });

    it('does not duplicate unchanged patterns on a forced rerun', async () => {
      const first = await orchestrator.detectPatterns();
      const second = await orchestrator.detectPatterns({ force: true });

      expect(second.map(p => p.id)).toEqual(first.map(p => p.id));
      expect(await store.listPatterns()).toHaveLength(1);
      expect((await store.getDetectionState()).runCount).toBe(2);
    });

    it('adds model-proposed patterns for metrics with data', async () => {
      provider = MockProvider.replying(JSON.stringify([
        {
          name: 'Readiness slipping',
          description: 'Readiness drifts down midweek',
          variables: ['readiness'],
          patternType: 'trend',
          strength: -0.4,
          confidence: 0.6,
        },
        { name: 'Steps', description: 'More steps, better sleep', variables: ['steps'], strength: 0.5, confidence: 0.9 },
      ]));
      await runtime.shutdown();
      setup({ config: testConfig({ patterns: { includeLlm: true } }) });
      await seedWeek(store);

      const active = await orchestrator.detectPatterns();

      expect(active).toHaveLength(2);
      const llm = active.find(p => p.source === 'llm');
      expect(llm?.name).toBe('Readiness slipping');
      expect(llm?.sampleSize).toBe(7);
      expect(llm?.actionable).toBe(false);
      expect(provider.calls).toHaveLength(1);
    });

    it('keeps model-proposed weekday patterns apart by day and drops those without one', async () => {
      provider = MockProvider.replying(JSON.stringify({
        patterns: [
          { name: 'Monday dip', description: 'Shorter sleep on Mondays', variables: ['sleep_hours'], patternType: 'weekday', weekday: 'Monday', strength: -0.5, confidence: 0.7 },
          { name: 'Friday lift', description: 'Longer sleep on Fridays', variables: ['sleep_hours'], patternType: 'weekday', weekday: 'Friday', strength: 0.5, confidence: 0.7 },
          { name: 'Some day', description: 'Sleep changes on one day', variables: ['sleep_hours'], patternType: 'weekday', strength: 0.3, confidence: 0.6 },
        ],
      }));
      await runtime.shutdown();
      setup({ config: testConfig({ patterns: { includeLlm: true } }) });
      await seedWeek(store);

      const active = await orchestrator.detectPatterns();
      const llm = active.filter(p => p.source === 'llm');

      expect(llm.map(p => [p.name, p.weekday])).toEqual([
        ['Monday dip', 'Monday'],
        ['Friday lift', 'Friday'],
      ]);
      expect(llm.every(p => p.patternType === 'weekday' && p.details.method === 'llm')).toBe(true);
      expect(await store.listPatterns({ activeOnly: true })).toHaveLength(3);
    });

    it('deactivates a pattern that stops showing up for three forced runs', async () => {
      const [pattern] = await orchestrator.detectPatterns();
      await store.putMetricValues('sleep_hours', dailySeries('2026-03-02', Array.from({ length: 7 }, () => 7)));

      for (const run of [2, 3]) {
        const active = await orchestrator.detectPatterns({ force: true });
        expect(active.map(p => p.id)).toEqual([pattern.id]);
        expect((await store.getDetectionState()).runCount).toBe(run);
      }

      const final = await orchestrator.detectPatterns({ force: true });
      expect(final).toEqual([]);
      expect(await store.listPatterns({ activeOnly: true })).toEqual([]);
      expect(await store.listPatterns()).toEqual([
        expect.objectContaining({ id: pattern.id, active: false, deactivatedAt: '2026-03-08T07:00:00.000Z' }),
      ]);
      expect(await store.getDetectionState()).toMatchObject({ runCount: 4, lastSeen: {} });
    });
  });

  describe('feedback', () => {
    it('rejects feedback for an unknown insight', async () => {
      const error = await orchestrator.recordFeedback('missing', 'helpful').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(VitalsenseError);
      expect(error).toMatchObject({ code: 'INSIGHT_NOT_FOUND' });
    });

    it('stores the event, marks acted-on insights and updates preferences', async () => {
      await store.putInsight(insightRecord());
      const seen: string[] = [];
      runtime.events.on('feedback:recorded', ({ event }) => seen.push(event.feedbackType));

      const event = await orchestrator.recordFeedback('insight-1', 'acted_on');

      expect(Object.isFrozen(event)).toBe(true);
      expect(event.timestamp).toBe('2026-03-08T07:00:00.000Z');
      expect(await store.listFeedback('insight-1')).toEqual([event]);
      expect((await store.getInsightById('insight-1'))?.actedOn).toBe(true);
      expect((await store.getPreference('tone', 'casual'))?.weight).toBeCloseTo(0.15, 10);
      expect(seen).toEqual(['acted_on']);
    });
  });

  describe('daily cycle', () => {
    beforeEach(async () => {
      provider = new MockProvider([{ kind: 'respond', respond: personaReply }]);
      await runtime.shutdown();
      setup();
      await seedWeek(store);
    });

    it('adds the weekly review on the review day', async () => {
      // 2026-03-08 is a Sunday
      const result = await orchestrator.runDailyCycle('2026-03-08');

      expect(result.failures).toEqual([]);
      expect(result.brief?.type).toBe('daily_brief');
      expect(result.prediction?.overall).toBe(6);
      expect(result.review?.type).toBe('weekly_review');
      expect(provider.calls).toHaveLength(3);
    });

    it('skips the review on other days', async () => {
      const result = await orchestrator.runDailyCycle('2026-03-09');

      expect(result.review).toBeUndefined();
      expect(result.brief?.date).toBe('2026-03-09');
    });

    it('learns the schedule from recent check-ins', async () => {
      for (const date of ['2026-03-02', '2026-03-03', '2026-03-04', '2026-03-05']) {
        await store.putCheckIn({ date, time: '08:00', level: 5 });
        await store.putCheckIn({ date, time: '20:00', level: 2 });
      }

      await orchestrator.runDailyCycle('2026-03-09');

      expect((await store.getPreference('schedule', 'morning'))?.weight).toBeCloseTo(0.1, 10);
    });

    it('collects a failure without blocking the other insights', async () => {
      await runtime.shutdown();
      setup({ store: new FlakyBriefStore() });
      await seedWeek(store);

      const result = await orchestrator.runDailyCycle('2026-03-09');

      expect(result.brief).toBeNull();
      expect(result.failures).toEqual([{ type: 'daily_brief', error: 'disk I/O error' }]);
      expect(result.prediction?.overall).toBe(6);
    });

    it('rethrows configuration errors', async () => {
      provider.available = false;
      await expect(orchestrator.runDailyCycle('2026-03-09')).rejects.toThrow(ConfigurationError);
    });
  });

  describe('runtime', () => {
    it('shuts down once', async () => {
      await runtime.shutdown();
      await runtime.shutdown();
      expect(runtime.isShutdown).toBe(true);
    });
  });
});
