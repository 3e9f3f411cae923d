export { PatternAnalyzer, tieBreak } from './pattern-analyzer.js';
export { mergePatterns, patternKey, hasDrifted } from './pattern-merge.js';
export type { MergeResult } from './pattern-merge.js';
export * from './statistics.js';
export { METRIC_CATALOGUE, describeMetric, metricLabel, formatMetricValue } from './metrics.js';
export type { MetricDefinition } from './metrics.js';
export { EMPTY_DETECTION_STATE } from './types.js';
export type {
  AnalysisInput,
  DetectionState,
  MetricData,
  MetricPoint,
  MetricSeries,
  PatternCandidate,
  PatternDetails,
  PatternMethod,
  PatternRecord,
  PatternSource,
  PatternType,
} from './types.js';
