/**
 * VitalsenseRuntime: the explicit state every component shares.
 *
 * Owns the store handle, the single-flight tables, the preference mutex and
 * the event bus. Construct one per process (or per test), pass it to the
 * orchestrator and call `shutdown()` when done.
 */

import { getLogger } from './logger.js';
import { AsyncMutex } from './mutex.js';
import { SingleFlight } from './single-flight.js';
import { EventBus } from './events.js';
import type { VitalsenseConfig } from './types.js';
import { CostTracker } from '../cost/tracker.js';
import { LLMGateway } from '../gateway/llm-gateway.js';
import { PersonalizationEngine } from '../personalization/personalization-engine.js';
import { createProvider, resolveModel } from '../providers/registry.js';
import type { LLMProvider } from '../providers/types.js';
import type { CalendarSource, InsightStore } from '../storage/types.js';
import type { InsightNotifier, InsightRecord } from '../insights/types.js';
import type { EnergyPrediction } from '../energy/types.js';
import type { PatternRecord } from '../analysis/types.js';

export interface RuntimeOptions {
  config: VitalsenseConfig;
  store: InsightStore;
  /** Defaults to the provider named in config */
  provider?: LLMProvider;
  calendar?: CalendarSource;
  notifier?: InsightNotifier;
  clock?: () => Date;
}

export interface FlightTables {
  dailyBrief: SingleFlight<InsightRecord>;
  weeklyReview: SingleFlight<InsightRecord>;
  energy: SingleFlight<EnergyPrediction>;
  patterns: SingleFlight<PatternRecord[]>;
}

export class VitalsenseRuntime {
  readonly config: VitalsenseConfig;
  readonly store: InsightStore;
  readonly provider: LLMProvider;
  readonly calendar: CalendarSource | null;
  readonly notifier: InsightNotifier | null;
  readonly clock: () => Date;
  readonly events = new EventBus();
  readonly preferenceLock = new AsyncMutex();
  readonly flights: FlightTables;
  readonly tracker: CostTracker;
  readonly gateway: LLMGateway;
  readonly personalization: PersonalizationEngine;
  private closed = false;

  constructor(options: RuntimeOptions) {
    this.config = options.config;
    this.store = options.store;
    this.provider = options.provider ?? createProvider(options.config);
    this.calendar = options.calendar ?? null;
    this.notifier = options.notifier ?? null;
    this.clock = options.clock ?? (() => new Date());

    const ttlMs = this.config.insights.lockTtlSeconds * 1000;
    this.flights = {
      dailyBrief: new SingleFlight(ttlMs),
      weeklyReview: new SingleFlight(ttlMs),
      energy: new SingleFlight(ttlMs),
      patterns: new SingleFlight(ttlMs),
    };

    this.tracker = new CostTracker(this.store, this.config.pricing, this.clock);
    this.gateway = new LLMGateway({
      provider: this.provider,
      tracker: this.tracker,
      config: this.config.gateway,
      model: resolveModel(this.provider, this.config),
    });
    this.personalization = new PersonalizationEngine(
      this.store,
      this.preferenceLock,
      this.config.personalization,
      this.clock,
    );
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  /**
   * Forget in-flight keys, drop listeners and close the store. Idempotent.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const table of Object.values(this.flights)) {
      table.clear();
    }
    this.events.removeAllListeners();
    this.store.close();
    getLogger().debug('Runtime shut down');
  }

  static create(options: RuntimeOptions): VitalsenseRuntime {
    return new VitalsenseRuntime(options);
  }
}
