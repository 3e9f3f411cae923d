/**
 * Vitalsense: daily health insights from personal metrics
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, InsightOrchestrator, SqliteInsightStore, VitalsenseRuntime } from 'vitalsense';
 *
 * const config = new ConfigManager().load();
 * const runtime = VitalsenseRuntime.create({ config, store: new SqliteInsightStore('./vitalsense.db') });
 * const brief = await new InsightOrchestrator(runtime).generateDailyBrief('2026-03-02');
 * await runtime.shutdown();
 * ```
 */

// Core
export { ConfigManager } from './core/config.js';
export { VitalsenseRuntime, type RuntimeOptions, type FlightTables } from './core/runtime.js';
export { EventBus, type VitalsenseEvents } from './core/events.js';
export { createLogger, getLogger, setLogger, type Logger, type LoggerOptions } from './core/logger.js';
export { AsyncMutex } from './core/mutex.js';
export { SingleFlight } from './core/single-flight.js';
export {
  VitalsenseError,
  ConfigurationError,
  InsufficientDataError,
  LLMTimeoutError,
  LLMProviderError,
  ParseError,
  StorageError,
  type ErrorStage,
} from './core/errors.js';
export {
  VitalsenseConfigSchema,
  DEFAULT_MODEL_PRICING,
  resolveConfig,
  type VitalsenseConfig,
  type AnalysisConfig,
  type PatternMergeConfig,
  type PersonalizationConfig,
  type GatewayConfig,
  type EnergyConfig,
  type ModelRate,
} from './core/types.js';

// Modules
export * from './analysis/index.js';
export * from './personalization/index.js';
export * from './prompt/index.js';
export * from './gateway/index.js';
export * from './cost/index.js';
export * from './energy/index.js';
export * from './insights/index.js';
export * from './storage/index.js';
export * from './providers/index.js';

// CLI
export { createCLI, main } from './cli/index.js';

export { VERSION, NAME } from './version.js';
