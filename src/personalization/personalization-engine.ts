/**
 * PersonalizationEngine: decaying preference weights driven by feedback
 *
 * One row per (category, key). Feedback on an insight nudges the rows the
 * insight touched: the focus areas it mentions, its length bucket and the
 * tone it was written in. Every read passes stored weights through `decay`,
 * so stale signals fade without a background job. All writes go through a
 * single mutex.
 */

import { getLogger } from '../core/logger.js';
import type { AsyncMutex } from '../core/mutex.js';
import type { PersonalizationConfig } from '../core/types.js';
import type { PreferenceStore } from '../storage/types.js';
import type { InsightRecord } from '../insights/types.js';
import { decay, elapsedDays } from './decay.js';
import {
  INSIGHT_LENGTHS,
  TONE_STYLES,
  type EffectiveWeight,
  type EnergyCheckIn,
  type FeedbackEvent,
  type FeedbackType,
  type InsightLength,
  type PersonalizationContext,
  type PreferenceCategory,
  type PreferenceWeight,
  type ScheduleKey,
  type ToneStyle,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

/** Focus area → words that count as a mention */
const FOCUS_KEYWORDS: Record<string, string[]> = {
  sleep: ['sleep', 'slept', 'bedtime', 'nap'],
  energy: ['energy', 'energized', 'tired', 'fatigue'],
  readiness: ['readiness', 'ready'],
  activity: ['activity', 'steps', 'workout', 'exercise', 'walk'],
  recovery: ['recovery', 'recover', 'hrv', 'rest day'],
  mood: ['mood', 'stress', 'calm'],
};

const SHORT_MAX_WORDS = 50;
const LONG_MIN_WORDS = 150;

const MIN_SCHEDULE_CHECKINS = 7;
const MIN_SCHEDULE_PER_HALF = 3;
const MIN_SCHEDULE_DIFFERENCE = 0.5;

export interface PreferenceTarget {
  category: PreferenceCategory;
  key: string;
}

export function lengthBucket(content: string): InsightLength {
  const words = content.trim().split(/\s+/).filter(Boolean).length;
  if (words < SHORT_MAX_WORDS) return 'short';
  if (words > LONG_MIN_WORDS) return 'long';
  return 'medium';
}

export function mentionedFocusAreas(content: string): string[] {
  const text = content.toLowerCase();
  return Object.entries(FOCUS_KEYWORDS)
    .filter(([, words]) => words.some(word => new RegExp(`\\b${word}`).test(text)))
    .map(([area]) => area);
}

function isTone(key: string): key is ToneStyle {
  return TONE_STYLES.some(tone => tone === key);
}

function isLength(key: string): key is InsightLength {
  return INSIGHT_LENGTHS.some(length => length === key);
}

function parseHour(time: string): number | null {
  const match = /^(\d{1,2}):(\d{2})/.exec(time);
  if (!match) return null;
  const hour = Number(match[1]);
  return hour >= 0 && hour < 24 ? hour : null;
}

// ═══════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════

export class PersonalizationEngine {
  private logger = getLogger().child({ component: 'personalization' });

  constructor(
    private readonly store: PreferenceStore,
    private readonly mutex: AsyncMutex,
    private readonly config: PersonalizationConfig,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Signed weight change for a feedback type
   */
  increment(feedbackType: FeedbackType): number {
    switch (feedbackType) {
      case 'helpful':
        return this.config.helpfulIncrement;
      case 'acted_on':
        return this.config.actedOnIncrement;
      case 'not_helpful':
        return -this.config.notHelpfulPenalty;
      case 'dismissed':
        return -this.config.dismissedPenalty;
    }
  }

  /**
   * Rows a piece of feedback on `insight` should move
   */
  targetsFor(insight: Pick<InsightRecord, 'content' | 'tone'>): PreferenceTarget[] {
    return [
      ...mentionedFocusAreas(insight.content).map(key => ({ category: 'focus' as const, key })),
      { category: 'length', key: lengthBucket(insight.content) },
      { category: 'tone', key: insight.tone },
    ];
  }

  /**
   * Apply one feedback event. Resolves once every affected row is written, so
   * the next generation reads the updated weights.
   */
  async applyFeedback(event: FeedbackEvent, insight: Pick<InsightRecord, 'content' | 'tone'>): Promise<PreferenceWeight[]> {
    const delta = this.increment(event.feedbackType);
    const targets = this.targetsFor(insight);

    const updated = await this.mutex.withLock(async () => {
      const now = this.clock();
      const rows: PreferenceWeight[] = [];
      for (const target of targets) {
        rows.push(await this.adjust(target.category, target.key, delta, now));
      }
      return rows;
    });

    this.logger.debug(
      { insightId: event.insightId, feedbackType: event.feedbackType, delta, rows: updated.length },
      'Feedback applied',
    );
    return updated;
  }

  /**
   * Explicitly chosen preference. For single-valued categories the chosen key
   * is lifted above every other option.
   */
  async setPreference(category: PreferenceCategory, key: string, value: string = key): Promise<PreferenceWeight> {
    return this.mutex.withLock(async () => {
      const now = this.clock();
      const rows = await this.store.listPreferences(category);
      const existing = rows.find(row => row.key === key);

      let weight = 1.0;
      if (category !== 'focus') {
        const others = rows
          .filter(row => row.key !== key)
          .map(row => this.effective(row, now));
        const top = others.length > 0 ? Math.max(...others) : 0;
        weight = Math.max(weight, top + this.config.helpfulIncrement);
      }

      const row: PreferenceWeight = {
        category,
        key,
        value,
        weight,
        evidenceCount: (existing?.evidenceCount ?? 0) + 1,
        lastReinforced: now.toISOString(),
        source: 'explicit',
      };
      await this.store.putPreference(row);
      this.logger.info({ category, key }, 'Explicit preference set');
      return row;
    });
  }

  /**
   * Infer morning vs evening from when energy is reported high. Needs enough
   * check-ins in both halves of the day and a clear difference; otherwise
   * nothing is written and null is returned.
   */
  async learnSchedule(checkIns: EnergyCheckIn[]): Promise<ScheduleKey | null> {
    if (checkIns.length < MIN_SCHEDULE_CHECKINS) return null;

    const morning: number[] = [];
    const evening: number[] = [];
    for (const checkIn of checkIns) {
      const hour = parseHour(checkIn.time);
      if (hour === null) continue;
      if (hour >= 6 && hour < 12) morning.push(checkIn.level);
      else if (hour >= 18) evening.push(checkIn.level);
    }

    if (morning.length < MIN_SCHEDULE_PER_HALF || evening.length < MIN_SCHEDULE_PER_HALF) {
      return null;
    }

    const avg = (values: number[]): number => values.reduce((a, b) => a + b, 0) / values.length;
    const difference = avg(morning) - avg(evening);
    if (Math.abs(difference) <= MIN_SCHEDULE_DIFFERENCE) return null;

    const winner: ScheduleKey = difference > 0 ? 'morning' : 'evening';
    await this.mutex.withLock(async () => {
      await this.adjust('schedule', winner, this.config.helpfulIncrement, this.clock());
    });

    this.logger.debug({ winner, difference }, 'Schedule preference inferred');
    return winner;
  }

  async listPreferences(category?: PreferenceCategory): Promise<EffectiveWeight[]> {
    const now = this.clock();
    const rows = await this.store.listPreferences(category);
    return rows
      .map(row => ({
        category: row.category,
        key: row.key,
        weight: this.effective(row, now),
        evidenceCount: row.evidenceCount,
      }))
      .sort((a, b) => b.weight - a.weight);
  }

  /**
   * Snapshot of current preferences as plain data for the prompt builder
   */
  async buildContext(): Promise<PersonalizationContext> {
    const weights = await this.listPreferences();
    const positive = (category: PreferenceCategory): EffectiveWeight[] =>
      weights.filter(w => w.category === category && w.weight > 0);

    const focus = positive('focus').slice(0, this.config.topFocusAreas).map(w => w.key);
    const tone = positive('tone').map(w => w.key).find(isTone);
    const length = positive('length').map(w => w.key).find(isLength);

    const schedule = positive('schedule');
    const top = schedule.find(w => w.key === 'morning' || w.key === 'evening');

    return {
      focusAreas: focus.length > 0 ? focus : this.config.defaultFocusAreas.slice(0, this.config.topFocusAreas),
      toneStyle: tone ?? this.config.defaultTone,
      insightLength: length ?? this.config.defaultLength,
      morningPerson: top ? top.key === 'morning' : null,
      weights,
    };
  }

  // ─────────────────────────────────────────────────────────
  // INTERNALS (callers hold the mutex)
  // ─────────────────────────────────────────────────────────

  private effective(row: PreferenceWeight, now: Date): number {
    return decay(row.weight, elapsedDays(row.lastReinforced, now), this.config.halfLifeDays);
  }

  /**
   * Fold the stored weight to its decayed value, then apply `delta`
   */
  private async adjust(category: PreferenceCategory, key: string, delta: number, now: Date): Promise<PreferenceWeight> {
    const existing = await this.store.getPreference(category, key);
    const current = existing ? this.effective(existing, now) : 0;

    const row: PreferenceWeight = {
      category,
      key,
      value: existing?.value ?? key,
      weight: current + delta,
      evidenceCount: (existing?.evidenceCount ?? 0) + 1,
      lastReinforced: now.toISOString(),
      source: existing?.source ?? 'inferred',
    };
    await this.store.putPreference(row);
    return row;
  }
}
