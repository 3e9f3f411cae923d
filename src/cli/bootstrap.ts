/**
 * Shared setup for commands: config, logger, store and runtime
 */

import { resolve } from 'path';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import { VitalsenseRuntime } from '../core/runtime.js';
import { SqliteInsightStore } from '../storage/sqlite-store.js';
import { InsightOrchestrator } from '../insights/insight-orchestrator.js';

// A type alias, so it satisfies commander's OptionValues index signature
export type GlobalOptions = {
  dir: string;
  verbose?: boolean;
  db?: string;
  provider?: string;
  model?: string;
};

export interface Session {
  runtime: VitalsenseRuntime;
  orchestrator: InsightOrchestrator;
}

export function openSession(options: GlobalOptions): Session {
  const manager = new ConfigManager(resolve(options.dir));
  const providers: Record<string, string> = {};
  if (options.provider) providers.default = options.provider;
  if (options.model) providers.model = options.model;

  const config = manager.load({
    providers,
    ...(options.db ? { storage: { path: options.db } } : {}),
    ...(options.verbose ? { logging: { verbose: true } } : {}),
  });
  manager.ensureDirectories();
  setLogger(createLogger('vitalsense', { level: config.logging.level, verbose: config.logging.verbose }));

  const store = new SqliteInsightStore(config.storage.path ?? manager.getDefaultDatabasePath());
  const runtime = VitalsenseRuntime.create({ config, store });
  return { runtime, orchestrator: new InsightOrchestrator(runtime) };
}

/**
 * Open a session, run `fn`, and always shut the runtime down
 */
export async function withSession<T>(options: GlobalOptions, fn: (session: Session) => Promise<T>): Promise<T> {
  const session = openSession(options);
  try {
    return await fn(session);
  } finally {
    await session.runtime.shutdown();
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
