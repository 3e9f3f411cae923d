/**
 * Personalization Types
 *
 * Preference rows, feedback events and the context handed to the prompt
 * builder.
 */

// ═══════════════════════════════════════════════════════════════
// PREFERENCES
// ═══════════════════════════════════════════════════════════════

export type PreferenceCategory = 'focus' | 'tone' | 'length' | 'schedule';

export const PREFERENCE_CATEGORIES: readonly PreferenceCategory[] = ['focus', 'tone', 'length', 'schedule'];

export type ToneStyle = 'casual' | 'professional' | 'concise' | 'detailed';

export type InsightLength = 'short' | 'medium' | 'long';

export type ScheduleKey = 'morning' | 'evening';

export const TONE_STYLES: readonly ToneStyle[] = ['casual', 'professional', 'concise', 'detailed'];
export const INSIGHT_LENGTHS: readonly InsightLength[] = ['short', 'medium', 'long'];

export interface PreferenceWeight {
  category: PreferenceCategory;
  key: string;
  value: string;
  /** Stored weight as of `lastReinforced`; read through decay */
  weight: number;
  evidenceCount: number;
  lastReinforced: string;
  source: 'explicit' | 'inferred';
}

export interface EffectiveWeight {
  category: PreferenceCategory;
  key: string;
  weight: number;
  evidenceCount: number;
}

// ═══════════════════════════════════════════════════════════════
// FEEDBACK
// ═══════════════════════════════════════════════════════════════

export type FeedbackType = 'helpful' | 'not_helpful' | 'acted_on' | 'dismissed';

export const FEEDBACK_TYPES: readonly FeedbackType[] = ['helpful', 'not_helpful', 'acted_on', 'dismissed'];

export interface FeedbackEvent {
  readonly id: string;
  readonly insightId: string;
  readonly feedbackType: FeedbackType;
  readonly timestamp: string;
}

/**
 * Self-reported energy at a time of day
 */
export interface EnergyCheckIn {
  date: string;
  /** HH:MM, local time */
  time: string;
  /** 1–5 */
  level: number;
}

// ═══════════════════════════════════════════════════════════════
// CONTEXT
// ═══════════════════════════════════════════════════════════════

export interface PersonalizationContext {
  focusAreas: string[];
  toneStyle: ToneStyle;
  insightLength: InsightLength;
  morningPerson: boolean | null;
  weights: EffectiveWeight[];
}
