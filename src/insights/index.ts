export {
  InsightOrchestrator,
  DAILY_BRIEF_CONFIDENCE,
  WEEKLY_REVIEW_CONFIDENCE,
} from './insight-orchestrator.js';
export type { DailyCycleFailure, DailyCycleResult, DetectOptions } from './insight-orchestrator.js';
export { INSIGHT_TYPES } from './types.js';
export type {
  GenerateOptions,
  InsightContext,
  InsightNotification,
  InsightNotifier,
  InsightRecord,
  InsightType,
  PredictionSnapshot,
} from './types.js';
