import type { Weekday } from '../utils/dates.js';
import type { PatternType } from '../analysis/types.js';
import type { PersonalizationContext } from '../personalization/types.js';

/**
 * Opaque calendar load for one day
 */
export interface CalendarDensity {
  meetingCount: number;
  meetingHours: number;
}

/**
 * Today's reading against the rolling average of the days before it
 */
export interface MetricDelta {
  metric: string;
  label: string;
  unit: string;
  today: number | null;
  average: number | null;
  delta: number | null;
  /** e.g. "+0.4 h vs 7-day avg" */
  deltaText: string;
  samples: number;
}

export interface PatternSummary {
  name: string;
  description: string;
  patternType: PatternType;
  strength: number;
  confidence: number;
  actionable: boolean;
}

export interface DailyBriefContext {
  kind: 'daily_brief';
  date: string;
  dayOfWeek: Weekday;
  lookbackDays: number;
  metrics: MetricDelta[];
  calendar: CalendarDensity | null;
  patterns: PatternSummary[];
  personalization: PersonalizationContext;
  flags: {
    /** At least 2 of the last 3 nights under 6 h */
    shortSleepStreak: boolean;
    heavyCalendar: boolean;
  };
}

export interface DaySummary {
  date: string;
  dayOfWeek: Weekday;
  values: Record<string, number | null>;
}

export interface DatedValue {
  date: string;
  value: number;
}

export interface WeeklyMetricSummary {
  metric: string;
  label: string;
  unit: string;
  average: number | null;
  best: DatedValue | null;
  worst: DatedValue | null;
  previousAverage: number | null;
  delta: number | null;
  deltaText: string;
  samples: number;
}

export interface WeeklyReviewContext {
  kind: 'weekly_review';
  weekStart: string;
  weekEnding: string;
  days: DaySummary[];
  metrics: WeeklyMetricSummary[];
  patterns: PatternSummary[];
  personalization: PersonalizationContext;
}

export interface RegressionHint {
  predicted: number;
  confidence: number;
  sampleSize: number;
}

export interface EnergyPredictionContext {
  kind: 'energy_prediction';
  date: string;
  dayOfWeek: Weekday;
  metrics: MetricDelta[];
  calendar: CalendarDensity | null;
  patterns: PatternSummary[];
  personalization: PersonalizationContext;
  /** Last self-reported levels on the 1–5 scale, oldest first */
  recentEnergy: DatedValue[];
  regression: RegressionHint | null;
}

export interface MetricStatistics {
  metric: string;
  label: string;
  unit: string;
  samples: number;
  mean: number;
  min: number;
  max: number;
  stdDev: number;
  weekdayMeans: Partial<Record<Weekday, number>>;
}

export interface PatternAnalysisContext {
  kind: 'pattern_analysis';
  windowEnd: string;
  windowDays: number;
  metrics: MetricStatistics[];
  knownPatterns: PatternSummary[];
}

export type PromptContext =
  | DailyBriefContext
  | WeeklyReviewContext
  | EnergyPredictionContext
  | PatternAnalysisContext;
