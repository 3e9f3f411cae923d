/**
 * Insight Orchestrator: the entry points.
 *
 * Each (type, date) moves absent → generating → persisted. Generation for a
 * key runs at most once at a time through the runtime's single-flight
 * tables; later callers for the same key get the in-flight result. A caller
 * that aborts only stops waiting: the generation finishes and is stored.
 *
 * Provider trouble never escapes from here. The gateway turns it into a
 * fallback and the record is stored with `degraded: true`. Configuration
 * problems do escape, as ConfigurationError.
 */

import { nanoid } from 'nanoid';
import { getLogger } from '../core/logger.js';
import { ConfigurationError, VitalsenseError, toError } from '../core/errors.js';
import type { VitalsenseRuntime } from '../core/runtime.js';
import { PatternAnalyzer, tieBreak } from '../analysis/pattern-analyzer.js';
import { mergePatterns } from '../analysis/pattern-merge.js';
import { clamp, round } from '../analysis/statistics.js';
import type { MetricData, PatternCandidate, PatternRecord } from '../analysis/types.js';
import { PromptContextBuilder } from '../prompt/context-builder.js';
import type { CalendarDensity, RegressionHint } from '../prompt/types.js';
import type { LlmPattern } from '../gateway/schemas.js';
import { payloadOf, type ParseResult } from '../gateway/types.js';
import { EnergyPredictor, ENERGY_SCALE } from '../energy/energy-predictor.js';
import { reconcileEnergyPrediction } from '../energy/prediction-policy.js';
import { PredictionComparator } from '../energy/comparator.js';
import type { EnergyPrediction, PredictionComparison } from '../energy/types.js';
import { lengthBucket } from '../personalization/personalization-engine.js';
import type { FeedbackEvent, FeedbackType, PersonalizationContext } from '../personalization/types.js';
import { addDays, formatDate, isIsoDate, weekdayName } from '../utils/dates.js';
import type {
  GenerateOptions,
  InsightContext,
  InsightRecord,
  InsightType,
  PredictionSnapshot,
} from './types.js';

/** Confidence stored with a successfully generated text insight */
export const DAILY_BRIEF_CONFIDENCE = 0.8;
export const WEEKLY_REVIEW_CONFIDENCE = 0.75;

const WEEK_DAYS = 7;
const SCHEDULE_LOOKBACK_DAYS = 30;
const MS_PER_HOUR = 3_600_000;

export interface DetectOptions {
  /** Lookback window; clamped to 7–90 */
  days?: number;
  /** Run even when the last run is more recent than the minimum interval */
  force?: boolean;
  signal?: AbortSignal;
}

export interface DailyCycleFailure {
  type: InsightType;
  error: string;
}

export interface DailyCycleResult {
  date: string;
  brief: InsightRecord | null;
  prediction: EnergyPrediction | null;
  /** Undefined when the date is not the review day */
  review?: InsightRecord | null;
  failures: DailyCycleFailure[];
}

function assertDate(date: string): void {
  if (!isIsoDate(date)) {
    throw new RangeError(`Invalid date "${date}"; expected YYYY-MM-DD`);
  }
}

function describePrediction(prediction: EnergyPrediction): string {
  const parts = [`Expected energy: ${prediction.overall.toFixed(1)}/10.`];
  if (prediction.peakHours.length > 0) parts.push(`Peak: ${prediction.peakHours.join(', ')}.`);
  if (prediction.lowHours.length > 0) parts.push(`Low: ${prediction.lowHours.join(', ')}.`);
  parts.push(prediction.suggestion);
  return parts.join(' ');
}

export class InsightOrchestrator {
  private logger = getLogger().child({ component: 'orchestrator' });
  private builder = new PromptContextBuilder();
  private analyzer: PatternAnalyzer;

  constructor(private readonly runtime: VitalsenseRuntime) {
    this.analyzer = new PatternAnalyzer(
      runtime.config.analysis,
      runtime.config.patterns.strengthDriftTolerance,
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // TEXT INSIGHTS
  // ═══════════════════════════════════════════════════════════════

  /**
   * Morning brief for `date`. Returns the stored brief unless `force`.
   */
  async generateDailyBrief(date: string, options: GenerateOptions = {}): Promise<InsightRecord> {
    assertDate(date);
    return this.runtime.flights.dailyBrief.run(
      date,
      () => this.generateText('daily_brief', date, options.force ?? false),
      options.signal,
    );
  }

  /**
   * Review of the seven days ending on `weekEnding`. Returns the stored
   * review unless `force`.
   */
  async generateWeeklyReview(weekEnding: string, options: GenerateOptions = {}): Promise<InsightRecord> {
    assertDate(weekEnding);
    return this.runtime.flights.weeklyReview.run(
      weekEnding,
      () => this.generateText('weekly_review', weekEnding, options.force ?? false),
      options.signal,
    );
  }

  private async generateText(type: 'daily_brief' | 'weekly_review', date: string, force: boolean): Promise<InsightRecord> {
    const existing = await this.runtime.store.getInsight(type, date);
    if (existing && !force) {
      this.logger.debug({ type, date, id: existing.id }, 'Insight already exists');
      return existing;
    }

    const { insights } = this.runtime.config;
    const personalization = await this.runtime.personalization.buildContext();
    const patterns = await this.runtime.store.listPatterns({ activeOnly: true });

    let context: InsightContext;
    let result: ParseResult<string>;
    let confidence: number;

    if (type === 'daily_brief') {
      const series = await this.loadSeries(addDays(date, -insights.lookbackDays), date);
      const calendar = await this.calendarFor(date);
      const brief = this.builder.buildDailyBrief({
        date,
        series,
        patterns,
        personalization,
        calendar,
        lookbackDays: insights.lookbackDays,
      });
      context = brief;
      result = await this.runtime.gateway.complete('daily_brief_coach', brief);
      confidence = DAILY_BRIEF_CONFIDENCE;
    } else {
      const series = await this.loadSeries(addDays(date, -(2 * WEEK_DAYS - 1)), date);
      const review = this.builder.buildWeeklyReview({ weekEnding: date, series, patterns, personalization });
      context = review;
      result = await this.runtime.gateway.complete('weekly_reviewer', review);
      confidence = WEEKLY_REVIEW_CONFIDENCE;
    }

    const record = this.buildRecord(type, date, context, result, confidence, personalization, existing);
    await this.persist(record, existing);
    return record;
  }

  private buildRecord(
    type: InsightType,
    date: string,
    context: InsightContext,
    result: ParseResult<string>,
    confidence: number,
    personalization: PersonalizationContext,
    existing: InsightRecord | null,
  ): InsightRecord {
    const content = payloadOf(result);
    const degraded = result.status === 'failure';
    return {
      id: nanoid(12),
      type,
      date,
      content,
      context,
      confidence: degraded ? 0 : confidence,
      actedOn: false,
      degraded,
      ...(result.status === 'failure' ? { fallbackReason: result.reason } : {}),
      tone: personalization.toneStyle,
      length: degraded ? personalization.insightLength : lengthBucket(content),
      ...(existing ? { supersedes: existing.id } : {}),
      createdAt: this.runtime.clock().toISOString(),
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // ENERGY
  // ═══════════════════════════════════════════════════════════════

  /**
   * Fresh energy prediction for `date`. The latest prediction replaces any
   * stored one for the day.
   */
  async predictEnergy(date: string, options: Pick<GenerateOptions, 'signal'> = {}): Promise<EnergyPrediction> {
    assertDate(date);
    return this.runtime.flights.energy.run(date, () => this.runPrediction(date), options.signal);
  }

  private async runPrediction(date: string): Promise<EnergyPrediction> {
    const { energy, insights } = this.runtime.config;
    const series = await this.loadSeries(addDays(date, -energy.historyDays), date);
    const calendar = await this.calendarFor(date);

    const meetings = new Map<string, number>();
    for (const point of series.meeting_hours ?? []) {
      if (typeof point.value === 'number' && Number.isFinite(point.value)) meetings.set(point.date, point.value);
    }
    if (calendar) meetings.set(date, calendar.meetingHours);

    const predictor = new EnergyPredictor(energy);
    const samples = predictor.extractSamples(series, meetings, date);
    predictor.train(samples);
    const features = predictor.featuresFor(date, series, meetings);
    const regression = predictor.isTrained && features ? predictor.predict(features) : null;
    const hint: RegressionHint | null = regression
      ? { predicted: regression.predicted, confidence: regression.confidence, sampleSize: regression.sampleSize }
      : null;

    const personalization = await this.runtime.personalization.buildContext();
    const patterns = await this.runtime.store.listPatterns({ activeOnly: true });
    const context = this.builder.buildEnergyPrediction({
      date,
      series,
      patterns,
      personalization,
      calendar,
      lookbackDays: insights.lookbackDays,
      regression: hint,
    });

    const llm = await this.runtime.gateway.complete('energy_predictor', context);
    const prediction = reconcileEnergyPrediction({
      date,
      sampleSize: samples.length,
      threshold: energy.minTrainingSamples,
      regression,
      llm,
    });

    const snapshot: PredictionSnapshot = {
      source: prediction.source,
      overall: prediction.overall,
      regression: regression?.predicted ?? null,
      llm: llm.status === 'success' ? llm.payload.overall : null,
      insufficientData: prediction.insufficientData,
    };

    // A regression answer stands on its own; only a fallback answer is degraded
    const degraded = prediction.source === 'llm' && prediction.llmFailure !== null;
    const existing = await this.runtime.store.getInsight('energy_prediction', date);
    const content = describePrediction(prediction);
    const record: InsightRecord = {
      id: nanoid(12),
      type: 'energy_prediction',
      date,
      content,
      context,
      confidence: prediction.confidence,
      actedOn: false,
      degraded,
      ...(degraded && prediction.llmFailure ? { fallbackReason: prediction.llmFailure } : {}),
      tone: personalization.toneStyle,
      length: lengthBucket(content),
      prediction: snapshot,
      ...(existing ? { supersedes: existing.id } : {}),
      createdAt: this.runtime.clock().toISOString(),
    };

    await this.persist(record, existing);
    this.logger.info(
      { date, source: prediction.source, overall: prediction.overall, samples: samples.length },
      'Energy predicted',
    );
    return prediction;
  }

  /**
   * Score stored predictions against the energy reported on the same days
   */
  async compareEnergyPredictions(days = 30): Promise<PredictionComparison> {
    const to = formatDate(this.runtime.clock());
    const from = addDays(to, -days);
    const comparator = new PredictionComparator();

    for (const insight of await this.runtime.store.listInsights({ type: 'energy_prediction', from, to })) {
      const snapshot = insight.prediction;
      if (!snapshot) continue;
      if (snapshot.regression !== null) comparator.record('regression', insight.date, snapshot.regression);
      if (snapshot.llm !== null) comparator.record('llm', insight.date, snapshot.llm);
    }
    for (const point of await this.runtime.store.getMetricSeries('energy', from, to)) {
      if (typeof point.value === 'number' && Number.isFinite(point.value)) {
        comparator.recordActual(point.date, point.value * ENERGY_SCALE);
      }
    }

    return comparator.compare();
  }

  // ═══════════════════════════════════════════════════════════════
  // PATTERNS
  // ═══════════════════════════════════════════════════════════════

  /**
   * Analyze the window, merge with stored patterns and return the active set
   */
  async detectPatterns(options: DetectOptions = {}): Promise<PatternRecord[]> {
    return this.runtime.flights.patterns.run('detect', () => this.runDetection(options), options.signal);
  }

  private async runDetection(options: DetectOptions): Promise<PatternRecord[]> {
    const { store, config, clock } = this.runtime;
    const now = clock();
    const state = await store.getDetectionState();

    if (!options.force && state.lastRunAt) {
      const elapsedHours = (now.getTime() - Date.parse(state.lastRunAt)) / MS_PER_HOUR;
      if (elapsedHours < config.patterns.minRunIntervalHours) {
        this.logger.debug({ lastRunAt: state.lastRunAt }, 'Pattern detection ran recently; returning stored set');
        return store.listPatterns({ activeOnly: true });
      }
    }

    const days = clamp(Math.round(options.days ?? config.analysis.lookbackDays), 7, 90);
    const end = formatDate(now);
    const series = await this.loadSeries(addDays(end, -days), end);
    const stored = await store.listPatterns({ activeOnly: true });

    let candidates = this.analyzer.analyze({ series, lookbackDays: days });
    if (config.patterns.includeLlm) {
      const llm = await this.llmCandidates(series, end, days, stored);
      candidates = tieBreak([...candidates, ...llm]);
    }

    const merge = mergePatterns(stored, candidates, state, config.patterns, now, () => nanoid(12));
    for (const record of [...merge.deactivated, ...merge.created]) {
      await store.putPattern(record);
    }
    await store.putDetectionState(merge.state);

    this.logger.info(
      {
        candidates: candidates.length,
        created: merge.created.length,
        deactivated: merge.deactivated.length,
        active: merge.active.length,
      },
      'Pattern detection complete',
    );
    this.runtime.events.emit('patterns:detected', {
      active: merge.active,
      created: merge.created.length,
      deactivated: merge.deactivated.length,
    });
    return merge.active;
  }

  private async llmCandidates(
    series: MetricData,
    windowEnd: string,
    windowDays: number,
    known: PatternRecord[],
  ): Promise<PatternCandidate[]> {
    const context = this.builder.buildPatternAnalysis({ windowEnd, windowDays, series, patterns: known });
    const result = await this.runtime.gateway.complete('pattern_analyst', context);
    const from = addDays(windowEnd, -(windowDays - 1));

    return payloadOf(result)
      .map(pattern => this.toCandidate(pattern, series, from, windowEnd, windowDays))
      .filter((c): c is PatternCandidate => c !== null);
  }

  /**
   * Model-proposed pattern as a candidate; null when it names a metric we
   * have no data for, or is a weekday pattern without its day
   */
  private toCandidate(
    pattern: LlmPattern,
    series: MetricData,
    from: string,
    to: string,
    windowDays: number,
  ): PatternCandidate | null {
    if (pattern.patternType === 'weekday' && !pattern.weekday) return null;
    const variables = [...new Set(pattern.variables)].sort();
    const dateSets = variables.map(name =>
      new Set(
        (series[name] ?? [])
          .filter(p => p.date >= from && p.date <= to && typeof p.value === 'number' && Number.isFinite(p.value))
          .map(p => p.date),
      ),
    );
    const [first, ...rest] = dateSets;
    if (!first) return null;
    const sampleSize = [...first].filter(date => rest.every(set => set.has(date))).length;
    if (sampleSize === 0) return null;

    return {
      name: pattern.name,
      description: pattern.description,
      patternType: pattern.patternType,
      variables,
      ...(pattern.patternType === 'weekday' && pattern.weekday ? { weekday: pattern.weekday } : {}),
      strength: round(pattern.strength, 4),
      confidence: round(pattern.confidence, 4),
      sampleSize,
      actionable: pattern.actionable && sampleSize >= this.runtime.config.analysis.minActionableSampleSize,
      source: 'llm',
      details: { method: 'llm', windowDays },
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // FEEDBACK
  // ═══════════════════════════════════════════════════════════════

  /**
   * Store the event and apply it to preferences before resolving
   */
  async recordFeedback(insightId: string, feedbackType: FeedbackType): Promise<FeedbackEvent> {
    const { store, personalization, events, clock } = this.runtime;
    const insight = await store.getInsightById(insightId);
    if (!insight) {
      throw new VitalsenseError(`Insight ${insightId} not found`, 'INSIGHT_NOT_FOUND', 'personalize');
    }

    const event: FeedbackEvent = Object.freeze({
      id: nanoid(12),
      insightId,
      feedbackType,
      timestamp: clock().toISOString(),
    });

    await store.putFeedback(event);
    if (feedbackType === 'acted_on') {
      await store.markActedOn(insightId);
    }
    const touched = await personalization.applyFeedback(event, insight);

    this.logger.info({ insightId, feedbackType, rows: touched.length }, 'Feedback recorded');
    events.emit('feedback:recorded', { event });
    return event;
  }

  // ═══════════════════════════════════════════════════════════════
  // DAILY CYCLE
  // ═══════════════════════════════════════════════════════════════

  /**
   * Schedule inference, then brief, prediction and (on the review day) the
   * weekly review. A failure in one never blocks the others.
   */
  async runDailyCycle(date: string): Promise<DailyCycleResult> {
    assertDate(date);
    const { store, personalization, config } = this.runtime;

    try {
      const checkIns = await store.listCheckIns(addDays(date, -SCHEDULE_LOOKBACK_DAYS), date);
      await personalization.learnSchedule(checkIns);
    } catch (err) {
      this.logger.warn({ date, error: toError(err).message }, 'Schedule inference failed');
    }

    const isReviewDay = weekdayName(date) === config.insights.weeklyReviewDay;
    const [brief, prediction, review] = await Promise.allSettled([
      this.generateDailyBrief(date),
      this.predictEnergy(date),
      isReviewDay ? this.generateWeeklyReview(date) : Promise.resolve(null),
    ]);

    const failures: DailyCycleFailure[] = [];
    const collect = <T>(type: InsightType, outcome: PromiseSettledResult<T>): T | null => {
      if (outcome.status === 'fulfilled') return outcome.value;
      const error = toError(outcome.reason);
      if (error instanceof ConfigurationError) throw error;
      this.logger.error({ date, type, error: error.message }, 'Insight generation failed');
      failures.push({ type, error: error.message });
      return null;
    };

    const result: DailyCycleResult = {
      date,
      brief: collect('daily_brief', brief),
      prediction: collect('energy_prediction', prediction),
      failures,
    };
    if (isReviewDay) {
      result.review = collect('weekly_review', review);
    }
    return result;
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════

  private async loadSeries(from: string, to: string): Promise<MetricData> {
    const series: MetricData = {};
    for (const name of await this.runtime.store.listMetricNames()) {
      series[name] = await this.runtime.store.getMetricSeries(name, from, to);
    }
    return series;
  }

  /**
   * Calendar density is optional: read failures are logged and treated as
   * unknown
   */
  private async calendarFor(date: string): Promise<CalendarDensity | null> {
    const calendar = this.runtime.calendar;
    if (!calendar) return null;
    try {
      return await calendar.getDensity(date);
    } catch (err) {
      this.logger.warn({ date, error: toError(err).message }, 'Calendar unavailable; continuing without it');
      return null;
    }
  }

  private async persist(record: InsightRecord, existing: InsightRecord | null): Promise<void> {
    const { store, events, notifier } = this.runtime;
    await store.putInsight(record);

    this.logger.info(
      { type: record.type, date: record.date, id: record.id, degraded: record.degraded, supersedes: record.supersedes },
      'Insight persisted',
    );
    events.emit('insight:persisted', { insight: record, regenerated: existing !== null });
    if (record.fallbackReason) {
      events.emit('insight:degraded', { type: record.type, date: record.date, reason: record.fallbackReason });
    }

    if (!notifier) return;
    try {
      await notifier.notify({
        type: record.type,
        date: record.date,
        confidence: record.confidence,
        content: record.content,
        degraded: record.degraded,
      });
    } catch (err) {
      this.logger.warn({ id: record.id, error: toError(err).message }, 'Insight notification failed');
    }
  }
}
