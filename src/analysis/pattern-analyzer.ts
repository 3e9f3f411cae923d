import { getLogger } from '../core/logger.js';
import type { AnalysisConfig } from '../core/types.js';
import { addDays, daysBetween, isIsoDate, weekdayIndex, WEEKDAYS } from '../utils/dates.js';
import {
  clamp,
  cohensD,
  linearRegression,
  mean,
  pearson,
  welchTTest,
  type CorrelationResult,
} from './statistics.js';
import { formatMetricValue, metricLabel } from './metrics.js';
import { patternKey } from './pattern-merge.js';
import type {
  AnalysisInput,
  MetricData,
  MetricSeries,
  PatternCandidate,
  PatternType,
} from './types.js';

/** Metric name → (date → value), finite values only */
type CleanData = Map<string, Map<string, number>>;

const MIN_LOOKBACK_DAYS = 7;
const MAX_LOOKBACK_DAYS = 90;

function formatP(p: number): string {
  return p < 0.001 ? '<0.001' : p.toFixed(3);
}

function cleanSeries(series: MetricSeries): Map<string, number> {
  const byDate = new Map<string, number>();
  for (const point of series) {
    if (typeof point.value !== 'number' || !Number.isFinite(point.value)) continue;
    if (!isIsoDate(point.date)) continue;
    byDate.set(point.date, point.value);
  }
  return new Map([...byDate.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

function cleanData(data: MetricData): CleanData {
  const out: CleanData = new Map();
  for (const [name, series] of Object.entries(data)) {
    const cleaned = cleanSeries(series);
    if (cleaned.size > 0) out.set(name, cleaned);
  }
  return out;
}

function latestDate(data: CleanData): string | null {
  let latest: string | null = null;
  for (const series of data.values()) {
    for (const date of series.keys()) {
      if (latest === null || date > latest) latest = date;
    }
  }
  return latest;
}

/**
 * Keep the `days` days ending at `end` (inclusive)
 */
function windowed(data: CleanData, end: string, days: number): CleanData {
  const start = addDays(end, -days);
  const out: CleanData = new Map();
  for (const [name, series] of data) {
    const kept = new Map([...series].filter(([date]) => date > start && date <= end));
    if (kept.size > 0) out.set(name, kept);
  }
  return out;
}

function align(a: Map<string, number>, b: Map<string, number>): { x: number[]; y: number[] } {
  const x: number[] = [];
  const y: number[] = [];
  for (const [date, value] of a) {
    const other = b.get(date);
    if (other !== undefined) {
      x.push(value);
      y.push(other);
    }
  }
  return { x, y };
}

/**
 * Keep, per identity key, the candidate with the highest |strength| × confidence
 */
export function tieBreak(candidates: PatternCandidate[]): PatternCandidate[] {
  const best = new Map<string, PatternCandidate>();
  for (const candidate of candidates) {
    const key = patternKey(candidate);
    const current = best.get(key);
    const score = Math.abs(candidate.strength) * candidate.confidence;
    if (!current || score > Math.abs(current.strength) * current.confidence) {
      best.set(key, candidate);
    }
  }
  return [...best.values()];
}

/**
 * Statistical pattern detection over daily metric series.
 *
 * Pure: takes series in, returns candidate patterns out. Finding nothing is
 * an empty array, never an error.
 */
export class PatternAnalyzer {
  private logger = getLogger().child({ component: 'pattern-analyzer' });

  constructor(
    private readonly config: AnalysisConfig,
    private readonly driftTolerance = 0.1,
  ) {}

  analyze(input: AnalysisInput): PatternCandidate[] {
    const lookbackDays = clamp(
      Math.round(input.lookbackDays ?? this.config.lookbackDays),
      MIN_LOOKBACK_DAYS,
      MAX_LOOKBACK_DAYS,
    );
    const minSamples = input.minSamples ?? this.config.minSamples;

    const all = cleanData(input.series);
    const reference = input.referenceDate ?? latestDate(all);
    if (!reference) return [];

    const long = windowed(all, reference, lookbackDays);
    const longPatterns = [
      ...this.correlations(long, lookbackDays, minSamples, 'correlation'),
      ...this.trends(long, lookbackDays, minSamples, 'trend'),
      ...this.weekdayEffects(long, lookbackDays, minSamples),
    ];

    const shortDays = Math.min(this.config.slidingWindowDays, lookbackDays);
    const short = windowed(all, reference, shortDays);
    const shifts = [
      ...this.correlations(short, shortDays, minSamples, 'sliding_window'),
      ...this.trends(short, shortDays, minSamples, 'sliding_window'),
    ].filter(candidate => this.isRegimeShift(candidate, longPatterns));

    const changes = this.windowChanges(all, reference, minSamples);

    const result = tieBreak([...longPatterns, ...shifts, ...changes]);
    this.logger.debug(
      { reference, lookbackDays, metrics: all.size, long: longPatterns.length, shifts: shifts.length, changes: changes.length, kept: result.length },
      'Pattern analysis complete',
    );
    return result;
  }

  /**
   * Pearson correlation between two series aligned by date
   */
  correlatePair(a: MetricSeries, b: MetricSeries): CorrelationResult | null {
    const { x, y } = align(cleanSeries(a), cleanSeries(b));
    return pearson(x, y);
  }

  detectCorrelations(data: MetricData, windowDays = this.config.lookbackDays, minSamples = this.config.minSamples): PatternCandidate[] {
    return this.correlations(cleanData(data), windowDays, minSamples, 'correlation');
  }

  detectTrends(data: MetricData, windowDays = this.config.lookbackDays, minSamples = this.config.minSamples): PatternCandidate[] {
    return this.trends(cleanData(data), windowDays, minSamples, 'trend');
  }

  detectWeekdayEffects(data: MetricData, windowDays = this.config.lookbackDays, minSamples = this.config.minSamples): PatternCandidate[] {
    return this.weekdayEffects(cleanData(data), windowDays, minSamples);
  }

  detectWindowChanges(data: MetricData, referenceDate?: string, minSamples = this.config.minSamples): PatternCandidate[] {
    const all = cleanData(data);
    const reference = referenceDate ?? latestDate(all);
    return reference ? this.windowChanges(all, reference, minSamples) : [];
  }

  // ─── Detectors ────────────────────────────────────────────────────────────

  private correlations(data: CleanData, windowDays: number, minSamples: number, patternType: PatternType): PatternCandidate[] {
    const names = [...data.keys()].sort();
    const out: PatternCandidate[] = [];

    for (let i = 0; i < names.length; i++) {
      for (let j = i + 1; j < names.length; j++) {
        const a = names[i];
        const b = names[j];
        const seriesA = data.get(a);
        const seriesB = data.get(b);
        if (!seriesA || !seriesB) continue;

        const { x, y } = align(seriesA, seriesB);
        if (x.length < minSamples) continue;

        const result = pearson(x, y);
        if (!result) continue;
        if (Math.abs(result.r) < this.config.minCorrelationStrength) continue;
        if (result.pValue > this.config.significanceLevel) continue;

        out.push(this.correlationPattern(a, b, result, windowDays, patternType));
      }
    }

    return out;
  }

  private correlationPattern(
    a: string,
    b: string,
    { r, pValue, n }: CorrelationResult,
    windowDays: number,
    patternType: PatternType,
  ): PatternCandidate {
    const labelA = metricLabel(a);
    const labelB = metricLabel(b);
    const grade = Math.abs(r) >= 0.7 ? 'Strong' : 'Moderate';
    const direction = r > 0 ? 'positive' : 'negative';
    const prefix = patternType === 'sliding_window' ? 'Recent: ' : '';
    const relation = r > 0 ? 'higher' : 'lower';

    return {
      name: `${prefix}${grade} ${direction} correlation: ${labelA} ↔ ${labelB}`,
      description:
        `Higher ${labelA.toLowerCase()} tends to come with ${relation} ${labelB.toLowerCase()} ` +
        `(r=${r.toFixed(2)}, p=${formatP(pValue)}, n=${n})`,
      patternType,
      variables: [a, b],
      strength: r,
      confidence: clamp(1 - pValue, 0, 1),
      sampleSize: n,
      actionable: n >= this.config.minActionableSampleSize,
      source: 'statistical',
      details: { method: 'pearson', windowDays, r, pValue },
    };
  }

  private trends(data: CleanData, windowDays: number, minSamples: number, patternType: PatternType): PatternCandidate[] {
    const out: PatternCandidate[] = [];

    for (const [name, series] of data) {
      if (series.size < minSamples) continue;

      const dates = [...series.keys()];
      const first = dates[0];
      const x = dates.map(date => daysBetween(first, date));
      const y = [...series.values()];

      const fit = linearRegression(x, y);
      if (!fit || fit.pValue > this.config.significanceLevel) continue;

      const start = fit.intercept;
      if (start === 0) continue;
      const end = fit.intercept + fit.slope * x[x.length - 1];
      const changePercent = ((end - start) / Math.abs(start)) * 100;
      if (Math.abs(changePercent) < this.config.minTrendChangePercent) continue;

      const label = metricLabel(name);
      const rising = fit.slope > 0;
      const prefix = patternType === 'sliding_window' ? 'Recent: ' : '';

      out.push({
        name: `${prefix}${label} trending ${rising ? 'up' : 'down'}`,
        description:
          `${label} has ${rising ? 'risen' : 'fallen'} about ${Math.abs(changePercent).toFixed(0)}% ` +
          `over the last ${windowDays} days (p=${formatP(fit.pValue)}, n=${fit.n})`,
        patternType,
        variables: [name],
        strength: fit.r,
        confidence: clamp(1 - fit.pValue, 0, 1),
        sampleSize: fit.n,
        actionable: fit.n >= this.config.minActionableSampleSize,
        source: 'statistical',
        details: {
          method: 'linear_trend',
          windowDays,
          slope: fit.slope,
          intercept: fit.intercept,
          changePercent,
          pValue: fit.pValue,
        },
      });
    }

    return out;
  }

  private weekdayEffects(data: CleanData, windowDays: number, minSamples: number): PatternCandidate[] {
    const out: PatternCandidate[] = [];

    for (const [name, series] of data) {
      if (series.size < minSamples) continue;

      const groups: number[][] = WEEKDAYS.map(() => []);
      for (const [date, value] of series) {
        groups[weekdayIndex(date)].push(value);
      }

      groups.forEach((group, day) => {
        if (group.length < this.config.minWeekdaySamples) return;
        const rest = groups.filter((_, other) => other !== day).flat();
        if (rest.length < 2) return;

        const test = welchTTest(group, rest);
        if (test.pValue > this.config.significanceLevel) return;

        const d = cohensD(group, rest);
        if (d === 0) return;

        const weekday = WEEKDAYS[day];
        const label = metricLabel(name);
        const dayMean = mean(group);
        const restMean = mean(rest);

        out.push({
          name: `${label} ${d > 0 ? 'higher' : 'lower'} on ${weekday}s`,
          description:
            `${weekday} averages ${formatMetricValue(name, dayMean)} vs ${formatMetricValue(name, restMean)} ` +
            `on other days (p=${formatP(test.pValue)}, n=${series.size})`,
          patternType: 'weekday',
          variables: [name],
          weekday,
          strength: clamp(d, -1, 1),
          confidence: clamp(1 - test.pValue, 0, 1),
          sampleSize: series.size,
          actionable:
            series.size >= this.config.minActionableSampleSize &&
            group.length >= this.config.minWeekdaySamples,
          source: 'statistical',
          details: {
            method: 'weekday_welch',
            windowDays,
            weekdayMean: dayMean,
            otherMean: restMean,
            weekdaySamples: group.length,
            cohensD: d,
            pValue: test.pValue,
          },
        });
      });
    }

    return out;
  }

  /**
   * Last `windowChangeDays` days against the same span before them
   */
  private windowChanges(data: CleanData, reference: string, minSamples: number): PatternCandidate[] {
    const span = this.config.windowChangeDays;
    const recentStart = addDays(reference, -span);
    const previousStart = addDays(reference, -2 * span);
    const out: PatternCandidate[] = [];

    for (const [name, series] of data) {
      const recent: number[] = [];
      const previous: number[] = [];
      for (const [date, value] of series) {
        if (date > recentStart && date <= reference) recent.push(value);
        else if (date > previousStart && date <= recentStart) previous.push(value);
      }
      if (recent.length < 2 || previous.length < 2) continue;
      if (recent.length + previous.length < minSamples) continue;

      const recentMean = mean(recent);
      const previousMean = mean(previous);
      if (previousMean === 0) continue;

      const changePercent = ((recentMean - previousMean) / Math.abs(previousMean)) * 100;
      if (Math.abs(changePercent) < this.config.minWindowChangePercent) continue;

      const test = welchTTest(recent, previous);
      if (test.pValue > this.config.significanceLevel) continue;

      const d = cohensD(recent, previous);
      const label = metricLabel(name);
      const n = recent.length + previous.length;

      out.push({
        name: `Recent shift: ${label} ${changePercent > 0 ? 'up' : 'down'} ${Math.abs(changePercent).toFixed(0)}%`,
        description:
          `${label} averaged ${formatMetricValue(name, recentMean)} over the last ${span} days ` +
          `vs ${formatMetricValue(name, previousMean)} the ${span} days before (p=${formatP(test.pValue)}, n=${n})`,
        patternType: 'sliding_window',
        variables: [name],
        strength: clamp(d, -1, 1),
        confidence: clamp(1 - test.pValue, 0, 1),
        sampleSize: n,
        actionable: n >= this.config.minActionableSampleSize,
        source: 'statistical',
        details: {
          method: 'window_change',
          windowDays: 2 * span,
          recentMean,
          previousMean,
          changePercent,
          pValue: test.pValue,
        },
      });
    }

    return out;
  }

  /**
   * A short-window result only counts when the long window has nothing for
   * the same variables or disagrees by more than the drift tolerance.
   */
  private isRegimeShift(candidate: PatternCandidate, longPatterns: PatternCandidate[]): boolean {
    const baseType: PatternType = candidate.details.method === 'pearson' ? 'correlation' : 'trend';
    const counterpart = longPatterns.find(
      p => p.patternType === baseType && p.variables.join('|') === candidate.variables.join('|'),
    );
    return !counterpart || Math.abs(counterpart.strength - candidate.strength) > this.driftTolerance;
  }
}
