export { PersonalizationEngine, lengthBucket, mentionedFocusAreas } from './personalization-engine.js';
export type { PreferenceTarget } from './personalization-engine.js';
export { decay, elapsedDays } from './decay.js';
export { FEEDBACK_TYPES, INSIGHT_LENGTHS, TONE_STYLES } from './types.js';
export type {
  EffectiveWeight,
  EnergyCheckIn,
  FeedbackEvent,
  FeedbackType,
  InsightLength,
  PersonalizationContext,
  PreferenceCategory,
  PreferenceWeight,
  ScheduleKey,
  ToneStyle,
} from './types.js';
