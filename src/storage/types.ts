import type { MetricPoint, MetricSeries, DetectionState, PatternRecord } from '../analysis/types.js';
import type { InsightRecord, InsightType } from '../insights/types.js';
import type {
  EnergyCheckIn,
  FeedbackEvent,
  PreferenceCategory,
  PreferenceWeight,
} from '../personalization/types.js';
import type { TokenUsageRecord } from '../cost/types.js';
import type { CalendarDensity } from '../prompt/types.js';

export interface InsightQuery {
  type?: InsightType;
  /** Inclusive date bounds */
  from?: string;
  to?: string;
}

export interface TokenUsageQuery {
  /** ISO timestamp lower bound */
  since?: string;
  feature?: string;
}

/**
 * Keyed persistence for everything the core reads and writes.
 * Insights are unique per (type, date): `putInsight` replaces the record for
 * that key.
 */
export interface InsightStore {
  // Metrics
  getMetricSeries(metric: string, from: string, to: string): Promise<MetricSeries>;
  listMetricNames(): Promise<string[]>;
  putMetricValues(metric: string, points: MetricPoint[]): Promise<void>;
  listCheckIns(from: string, to: string): Promise<EnergyCheckIn[]>;
  putCheckIn(checkIn: EnergyCheckIn): Promise<void>;

  // Patterns
  listPatterns(options?: { activeOnly?: boolean }): Promise<PatternRecord[]>;
  putPattern(pattern: PatternRecord): Promise<void>;
  getDetectionState(): Promise<DetectionState>;
  putDetectionState(state: DetectionState): Promise<void>;

  // Insights
  getInsight(type: InsightType, date: string): Promise<InsightRecord | null>;
  getInsightById(id: string): Promise<InsightRecord | null>;
  putInsight(insight: InsightRecord): Promise<void>;
  listInsights(query?: InsightQuery): Promise<InsightRecord[]>;
  markActedOn(id: string): Promise<void>;

  // Preferences
  getPreference(category: PreferenceCategory, key: string): Promise<PreferenceWeight | null>;
  putPreference(preference: PreferenceWeight): Promise<void>;
  listPreferences(category?: PreferenceCategory): Promise<PreferenceWeight[]>;

  // Feedback
  putFeedback(event: FeedbackEvent): Promise<void>;
  listFeedback(insightId?: string): Promise<FeedbackEvent[]>;

  // Token usage
  appendTokenUsage(record: TokenUsageRecord): Promise<void>;
  listTokenUsage(query?: TokenUsageQuery): Promise<TokenUsageRecord[]>;

  close(): void;
}

export type PreferenceStore = Pick<InsightStore, 'getPreference' | 'putPreference' | 'listPreferences'>;

export type UsageStore = Pick<InsightStore, 'appendTokenUsage' | 'listTokenUsage'>;

/**
 * Calendar collaborator; `null` when nothing is known for the day
 */
export interface CalendarSource {
  getDensity(date: string): Promise<CalendarDensity | null>;
}
