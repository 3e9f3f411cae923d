import type { DailyBriefContext, WeeklyReviewContext, EnergyPredictionContext } from '../prompt/types.js';
import type { InsightLength, ToneStyle } from '../personalization/types.js';
import type { FailureReason } from '../gateway/types.js';

export type InsightType = 'daily_brief' | 'weekly_review' | 'energy_prediction';

export const INSIGHT_TYPES: readonly InsightType[] = ['daily_brief', 'weekly_review', 'energy_prediction'];

/**
 * Both numbers behind an energy prediction, kept for later accuracy scoring
 */
export interface PredictionSnapshot {
  source: 'regression' | 'llm';
  overall: number;
  regression: number | null;
  /** Model answer when the call succeeded */
  llm: number | null;
  insufficientData: boolean;
}

export type InsightContext = DailyBriefContext | WeeklyReviewContext | EnergyPredictionContext;

export interface InsightRecord {
  id: string;
  type: InsightType;
  /** Brief/prediction day, or the last day of the reviewed week */
  date: string;
  content: string;
  /** The exact typed context the content was generated from */
  context: InsightContext;
  confidence: number;
  actedOn: boolean;
  /** Content is the documented fallback, not model output */
  degraded: boolean;
  fallbackReason?: FailureReason;
  tone: ToneStyle;
  length: InsightLength;
  /** Energy predictions only */
  prediction?: PredictionSnapshot;
  /** Id of the record this one replaced on forced regeneration */
  supersedes?: string;
  createdAt: string;
}

export interface GenerateOptions {
  force?: boolean;
  /** Stops this caller waiting; the generation itself keeps running */
  signal?: AbortSignal;
}

/**
 * What a notification collaborator receives after a new insight is stored
 */
export interface InsightNotification {
  type: InsightType;
  date: string;
  confidence: number;
  content: string;
  degraded: boolean;
}

export interface InsightNotifier {
  notify(notification: InsightNotification): Promise<void>;
}
