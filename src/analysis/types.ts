import type { Weekday } from '../utils/dates.js';

export interface MetricPoint {
  date: string;
  /** Missing or non-numeric readings are dropped before analysis */
  value: number | null;
}

/** Ordered (date, value) pairs for one metric */
export type MetricSeries = MetricPoint[];

/** Metric name → series */
export type MetricData = Record<string, MetricSeries>;

export type PatternType = 'correlation' | 'trend' | 'weekday' | 'sliding_window';

export type PatternSource = 'statistical' | 'llm';

export type PatternMethod = 'pearson' | 'linear_trend' | 'weekday_welch' | 'window_change' | 'llm';

export interface PatternDetails {
  method: PatternMethod;
  windowDays: number;
  pValue?: number;
  [key: string]: string | number | undefined;
}

/**
 * A pattern as produced by one analyzer run, before it is merged with the
 * stored set.
 */
export interface PatternCandidate {
  name: string;
  description: string;
  patternType: PatternType;
  /** One or two metric names, sorted */
  variables: string[];
  weekday?: Weekday;
  /** Signed, in [-1, 1] */
  strength: number;
  /** In [0, 1] */
  confidence: number;
  sampleSize: number;
  actionable: boolean;
  source: PatternSource;
  details: PatternDetails;
}

export interface PatternRecord extends PatternCandidate {
  id: string;
  active: boolean;
  discoveredAt: string;
  deactivatedAt?: string;
}

/**
 * Bookkeeping for staleness eviction across detection runs
 */
export interface DetectionState {
  runCount: number;
  lastRunAt: string | null;
  /** Pattern id → run number in which it was last rediscovered */
  lastSeen: Record<string, number>;
}

export interface AnalysisInput {
  series: MetricData;
  /** Clamped to 7–90 */
  lookbackDays?: number;
  minSamples?: number;
  /** Last day of the window; defaults to the latest date in the data */
  referenceDate?: string;
}

export const EMPTY_DETECTION_STATE: DetectionState = {
  runCount: 0,
  lastRunAt: null,
  lastSeen: {},
};
