import type { DetectionState, MetricPoint, MetricSeries, PatternRecord } from '../analysis/types.js';
import { EMPTY_DETECTION_STATE } from '../analysis/types.js';
import type { InsightRecord, InsightType } from '../insights/types.js';
import type {
  EnergyCheckIn,
  FeedbackEvent,
  PreferenceCategory,
  PreferenceWeight,
} from '../personalization/types.js';
import type { TokenUsageRecord } from '../cost/types.js';
import type { InsightQuery, InsightStore, TokenUsageQuery } from './types.js';

/**
 * Process-local InsightStore. Every read returns copies, so callers cannot
 * change stored state by mutating what they get back.
 */
export class MemoryInsightStore implements InsightStore {
  private metrics = new Map<string, Map<string, number | null>>();
  private checkIns = new Map<string, EnergyCheckIn>();
  private patterns = new Map<string, PatternRecord>();
  private detectionState: DetectionState = EMPTY_DETECTION_STATE;
  private insights = new Map<string, InsightRecord>();
  private preferences = new Map<string, PreferenceWeight>();
  private feedback: FeedbackEvent[] = [];
  private usage: TokenUsageRecord[] = [];

  // ─── Metrics ───────────────────────────────────────────────────────────────

  async getMetricSeries(metric: string, from: string, to: string): Promise<MetricSeries> {
    const values = this.metrics.get(metric);
    if (!values) return [];
    return [...values.entries()]
      .filter(([date]) => date >= from && date <= to)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, value]) => ({ date, value }));
  }

  async listMetricNames(): Promise<string[]> {
    return [...this.metrics.keys()].sort();
  }

  async putMetricValues(metric: string, points: MetricPoint[]): Promise<void> {
    let values = this.metrics.get(metric);
    if (!values) {
      values = new Map();
      this.metrics.set(metric, values);
    }
    for (const point of points) {
      values.set(point.date, point.value);
    }
  }

  async listCheckIns(from: string, to: string): Promise<EnergyCheckIn[]> {
    return [...this.checkIns.values()]
      .filter(c => c.date >= from && c.date <= to)
      .sort((a, b) => `${a.date} ${a.time}`.localeCompare(`${b.date} ${b.time}`))
      .map(c => ({ ...c }));
  }

  async putCheckIn(checkIn: EnergyCheckIn): Promise<void> {
    this.checkIns.set(`${checkIn.date} ${checkIn.time}`, { ...checkIn });
  }

  // ─── Patterns ──────────────────────────────────────────────────────────────

  async listPatterns(options: { activeOnly?: boolean } = {}): Promise<PatternRecord[]> {
    return [...this.patterns.values()]
      .filter(p => !options.activeOnly || p.active)
      .sort((a, b) => a.discoveredAt.localeCompare(b.discoveredAt) || a.id.localeCompare(b.id))
      .map(p => structuredClone(p));
  }

  async putPattern(pattern: PatternRecord): Promise<void> {
    this.patterns.set(pattern.id, structuredClone(pattern));
  }

  async getDetectionState(): Promise<DetectionState> {
    return structuredClone(this.detectionState);
  }

  async putDetectionState(state: DetectionState): Promise<void> {
    this.detectionState = structuredClone(state);
  }

  // ─── Insights ──────────────────────────────────────────────────────────────

  async getInsight(type: InsightType, date: string): Promise<InsightRecord | null> {
    const insight = this.insights.get(`${type}:${date}`);
    return insight ? structuredClone(insight) : null;
  }

  async getInsightById(id: string): Promise<InsightRecord | null> {
    for (const insight of this.insights.values()) {
      if (insight.id === id) return structuredClone(insight);
    }
    return null;
  }

  async putInsight(insight: InsightRecord): Promise<void> {
    this.insights.set(`${insight.type}:${insight.date}`, structuredClone(insight));
  }

  async listInsights(query: InsightQuery = {}): Promise<InsightRecord[]> {
    return [...this.insights.values()]
      .filter(i => !query.type || i.type === query.type)
      .filter(i => !query.from || i.date >= query.from)
      .filter(i => !query.to || i.date <= query.to)
      .sort((a, b) => a.date.localeCompare(b.date) || a.type.localeCompare(b.type))
      .map(i => structuredClone(i));
  }

  async markActedOn(id: string): Promise<void> {
    for (const insight of this.insights.values()) {
      if (insight.id === id) insight.actedOn = true;
    }
  }

  // ─── Preferences ───────────────────────────────────────────────────────────

  async getPreference(category: PreferenceCategory, key: string): Promise<PreferenceWeight | null> {
    const row = this.preferences.get(`${category}:${key}`);
    return row ? { ...row } : null;
  }

  async putPreference(preference: PreferenceWeight): Promise<void> {
    this.preferences.set(`${preference.category}:${preference.key}`, { ...preference });
  }

  async listPreferences(category?: PreferenceCategory): Promise<PreferenceWeight[]> {
    return [...this.preferences.values()]
      .filter(p => !category || p.category === category)
      .sort((a, b) => a.category.localeCompare(b.category) || a.key.localeCompare(b.key))
      .map(p => ({ ...p }));
  }

  // ─── Feedback ──────────────────────────────────────────────────────────────

  async putFeedback(event: FeedbackEvent): Promise<void> {
    this.feedback.push({ ...event });
  }

  async listFeedback(insightId?: string): Promise<FeedbackEvent[]> {
    return this.feedback.filter(e => !insightId || e.insightId === insightId).map(e => ({ ...e }));
  }

  // ─── Token usage ───────────────────────────────────────────────────────────

  async appendTokenUsage(record: TokenUsageRecord): Promise<void> {
    this.usage.push({ ...record });
  }

  async listTokenUsage(query: TokenUsageQuery = {}): Promise<TokenUsageRecord[]> {
    const since = query.since;
    return this.usage
      .filter(r => since === undefined || r.timestamp >= since)
      .filter(r => !query.feature || r.feature === query.feature)
      .map(r => ({ ...r }));
  }

  close(): void {
    // Nothing to release
  }
}
