export { MemoryInsightStore } from './memory-store.js';
export { SqliteInsightStore } from './sqlite-store.js';
export type {
  CalendarSource,
  InsightQuery,
  InsightStore,
  PreferenceStore,
  TokenUsageQuery,
  UsageStore,
} from './types.js';
