export { PromptContextBuilder, summarizePattern } from './context-builder.js';
export type {
  DailyBriefInput,
  EnergyContextInput,
  PatternAnalysisInput,
  WeeklyReviewInput,
} from './context-builder.js';
export * from './render.js';
export * from './templates/personas.js';
export { LENGTH_GUIDANCE, TONE_GUIDANCE } from './templates/styles.js';
export type {
  CalendarDensity,
  DailyBriefContext,
  DatedValue,
  DaySummary,
  EnergyPredictionContext,
  MetricDelta,
  MetricStatistics,
  PatternAnalysisContext,
  PatternSummary,
  PromptContext,
  RegressionHint,
  WeeklyMetricSummary,
  WeeklyReviewContext,
} from './types.js';
