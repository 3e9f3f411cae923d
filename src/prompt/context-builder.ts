/**
 * Prompt Context Builder: turns raw series into the pre-computed facts a
 * prompt may contain.
 *
 * Nothing here touches I/O: every method maps its inputs to a typed context
 * object, so the same inputs always give the same context. Raw series never
 * leave this module; prompts only see deltas, summaries and pattern text.
 */

import { addDays, dateRange, weekdayName, type Weekday } from '../utils/dates.js';
import type { MetricData, MetricSeries, PatternRecord } from '../analysis/types.js';
import { describeMetric, METRIC_CATALOGUE } from '../analysis/metrics.js';
import { mean, round, stdDev } from '../analysis/statistics.js';
import type { PersonalizationContext } from '../personalization/types.js';
import type {
  CalendarDensity,
  DailyBriefContext,
  DatedValue,
  DaySummary,
  EnergyPredictionContext,
  MetricDelta,
  MetricStatistics,
  PatternAnalysisContext,
  PatternSummary,
  RegressionHint,
  WeeklyMetricSummary,
  WeeklyReviewContext,
} from './types.js';

const DAILY_METRICS = ['sleep_hours', 'deep_sleep_hours', 'readiness', 'hrv', 'resting_hr'];
const DAILY_PATTERN_VARIABLES = ['sleep_hours', 'deep_sleep_hours', 'readiness'];
const ENERGY_METRICS = ['sleep_hours', 'deep_sleep_hours', 'readiness', 'energy'];
const ENERGY_PATTERN_VARIABLES = ['sleep_hours', 'deep_sleep_hours', 'readiness', 'energy'];
const LOWER_IS_BETTER = new Set(['resting_hr']);

const MAX_PATTERNS = 5;
const SHORT_SLEEP_HOURS = 6;
const HEAVY_CALENDAR_HOURS = 4;
const RECENT_ENERGY_DAYS = 7;

export interface DailyBriefInput {
  date: string;
  series: MetricData;
  patterns: PatternRecord[];
  personalization: PersonalizationContext;
  calendar: CalendarDensity | null;
  lookbackDays: number;
}

export interface WeeklyReviewInput {
  weekEnding: string;
  /** Should cover the reviewed week and the week before it */
  series: MetricData;
  patterns: PatternRecord[];
  personalization: PersonalizationContext;
}

export interface EnergyContextInput extends DailyBriefInput {
  regression: RegressionHint | null;
}

export interface PatternAnalysisInput {
  windowEnd: string;
  windowDays: number;
  series: MetricData;
  patterns: PatternRecord[];
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function valuesByDate(series: MetricSeries | undefined): Map<string, number> {
  const out = new Map<string, number>();
  for (const point of series ?? []) {
    if (typeof point.value === 'number' && Number.isFinite(point.value)) {
      out.set(point.date, point.value);
    }
  }
  return out;
}

function valuesBetween(values: Map<string, number>, from: string, to: string): DatedValue[] {
  return [...values.entries()]
    .filter(([date]) => date >= from && date <= to)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, value]) => ({ date, value }));
}

function signed(value: number, precision: number, unit: string): string {
  const sign = value > 0 ? '+' : value < 0 ? '-' : '±';
  const text = `${sign}${Math.abs(value).toFixed(precision)}`;
  return unit ? `${text} ${unit}` : text;
}

/**
 * Catalogue metrics first, in catalogue order, then the rest alphabetically
 */
function orderMetrics(names: string[]): string[] {
  const known = Object.keys(METRIC_CATALOGUE);
  const rank = (name: string): number => {
    const index = known.indexOf(name);
    return index === -1 ? known.length : index;
  };
  return [...names].sort((a, b) => rank(a) - rank(b) || a.localeCompare(b));
}

export function summarizePattern(pattern: PatternRecord): PatternSummary {
  return {
    name: pattern.name,
    description: pattern.description,
    patternType: pattern.patternType,
    strength: round(pattern.strength, 3),
    confidence: round(pattern.confidence, 3),
    actionable: pattern.actionable,
  };
}

function rankPatterns(patterns: PatternRecord[]): PatternSummary[] {
  return [...patterns]
    .sort((a, b) => b.confidence - a.confidence || Math.abs(b.strength) - Math.abs(a.strength))
    .slice(0, MAX_PATTERNS)
    .map(summarizePattern);
}

function patternsInvolving(patterns: PatternRecord[], variables: string[]): PatternSummary[] {
  return rankPatterns(
    patterns.filter(p => p.active && p.variables.some(v => variables.includes(v))),
  );
}

// ─── Builder ─────────────────────────────────────────────────────────────────

export class PromptContextBuilder {
  /**
   * Today's reading against the mean of the `lookbackDays` days before it
   */
  metricDelta(metric: string, series: MetricSeries | undefined, date: string, lookbackDays: number): MetricDelta {
    const { label, unit, precision } = describeMetric(metric);
    const values = valuesByDate(series);
    const today = values.get(date) ?? null;
    const history = valuesBetween(values, addDays(date, -lookbackDays), addDays(date, -1)).map(p => p.value);
    const average = history.length > 0 ? round(mean(history), 2) : null;
    const delta = today !== null && average !== null ? round(today - average, 2) : null;

    let deltaText: string;
    if (today === null) {
      deltaText = 'no reading today';
    } else if (delta === null) {
      deltaText = `no ${lookbackDays}-day baseline`;
    } else {
      deltaText = `${signed(delta, precision, unit)} vs ${lookbackDays}-day avg`;
    }

    return { metric, label, unit, today, average, delta, deltaText, samples: history.length };
  }

  buildDailyBrief(input: DailyBriefInput): DailyBriefContext {
    const { date, series, lookbackDays, calendar } = input;

    const sleep = valuesByDate(series.sleep_hours);
    const shortNights = valuesBetween(sleep, addDays(date, -2), date)
      .filter(p => p.value < SHORT_SLEEP_HOURS).length;

    return {
      kind: 'daily_brief',
      date,
      dayOfWeek: weekdayName(date),
      lookbackDays,
      metrics: this.deltas(DAILY_METRICS, series, date, lookbackDays),
      calendar,
      patterns: patternsInvolving(input.patterns, DAILY_PATTERN_VARIABLES),
      personalization: input.personalization,
      flags: {
        shortSleepStreak: shortNights >= 2,
        heavyCalendar: calendar !== null && calendar.meetingHours >= HEAVY_CALENDAR_HOURS,
      },
    };
  }

  buildWeeklyReview(input: WeeklyReviewInput): WeeklyReviewContext {
    const { weekEnding, series } = input;
    const weekStart = addDays(weekEnding, -6);
    const previousStart = addDays(weekStart, -7);
    const previousEnd = addDays(weekStart, -1);

    const names = orderMetrics(Object.keys(series));
    const byMetric = new Map(names.map((name): [string, Map<string, number>] => [name, valuesByDate(series[name])]));

    const days: DaySummary[] = dateRange(weekStart, weekEnding).map(date => ({
      date,
      dayOfWeek: weekdayName(date),
      values: Object.fromEntries(
        names.map((name): [string, number | null] => [name, byMetric.get(name)?.get(date) ?? null]),
      ),
    }));

    const metrics: WeeklyMetricSummary[] = [];
    for (const name of names) {
      const values = byMetric.get(name) ?? new Map<string, number>();
      const week = valuesBetween(values, weekStart, weekEnding);
      if (week.length === 0) continue;

      const previous = valuesBetween(values, previousStart, previousEnd).map(p => p.value);
      const { label, unit, precision } = describeMetric(name);
      const average = round(mean(week.map(p => p.value)), 2);
      const previousAverage = previous.length > 0 ? round(mean(previous), 2) : null;
      const delta = previousAverage !== null ? round(average - previousAverage, 2) : null;

      const lowerIsBetter = LOWER_IS_BETTER.has(name);
      const sorted = [...week].sort((a, b) => (lowerIsBetter ? a.value - b.value : b.value - a.value));

      metrics.push({
        metric: name,
        label,
        unit,
        average,
        best: sorted[0],
        worst: sorted[sorted.length - 1],
        previousAverage,
        delta,
        deltaText: delta === null ? 'no previous week data' : `${signed(delta, precision, unit)} vs previous week`,
        samples: week.length,
      });
    }

    return {
      kind: 'weekly_review',
      weekStart,
      weekEnding,
      days,
      metrics,
      patterns: rankPatterns(input.patterns.filter(p => p.active && p.actionable)),
      personalization: input.personalization,
    };
  }

  buildEnergyPrediction(input: EnergyContextInput): EnergyPredictionContext {
    const { date, series, lookbackDays } = input;
    const energy = valuesByDate(series.energy);

    return {
      kind: 'energy_prediction',
      date,
      dayOfWeek: weekdayName(date),
      metrics: this.deltas(ENERGY_METRICS, series, date, lookbackDays),
      calendar: input.calendar,
      patterns: patternsInvolving(input.patterns, ENERGY_PATTERN_VARIABLES),
      personalization: input.personalization,
      recentEnergy: valuesBetween(energy, addDays(date, -RECENT_ENERGY_DAYS), addDays(date, -1)),
      regression: input.regression,
    };
  }

  buildPatternAnalysis(input: PatternAnalysisInput): PatternAnalysisContext {
    const { windowEnd, windowDays, series } = input;
    const from = addDays(windowEnd, -(windowDays - 1));

    const metrics: MetricStatistics[] = [];
    for (const name of orderMetrics(Object.keys(series))) {
      const points = valuesBetween(valuesByDate(series[name]), from, windowEnd);
      if (points.length === 0) continue;

      const values = points.map(p => p.value);
      const groups = new Map<Weekday, number[]>();
      for (const point of points) {
        const day = weekdayName(point.date);
        groups.set(day, [...(groups.get(day) ?? []), point.value]);
      }

      const weekdayMeans: Partial<Record<Weekday, number>> = {};
      for (const [day, dayValues] of groups) {
        weekdayMeans[day] = round(mean(dayValues), 2);
      }

      const { label, unit } = describeMetric(name);
      metrics.push({
        metric: name,
        label,
        unit,
        samples: values.length,
        mean: round(mean(values), 2),
        min: Math.min(...values),
        max: Math.max(...values),
        stdDev: round(stdDev(values), 2),
        weekdayMeans,
      });
    }

    return {
      kind: 'pattern_analysis',
      windowEnd,
      windowDays,
      metrics,
      knownPatterns: rankPatterns(input.patterns.filter(p => p.active)),
    };
  }

  private deltas(names: string[], series: MetricData, date: string, lookbackDays: number): MetricDelta[] {
    return names
      .filter(name => (series[name]?.length ?? 0) > 0)
      .map(name => this.metricDelta(name, series[name], date, lookbackDays));
  }
}
