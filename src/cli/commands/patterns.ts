/**
 * `vitalsense patterns`: detect and list behavioral patterns
 */

import { Command } from 'commander';
import { printJson, withSession, type GlobalOptions } from '../bootstrap.js';
import { printPatterns } from '../format.js';

interface PatternsOptions {
  days?: number;
  force?: boolean;
  list?: boolean;
  json?: boolean;
}

export function createPatternsCommand(): Command {
  const cmd = new Command('patterns');

  cmd
    .description('Detect patterns in recent data and show the active set')
    .option('--days <n>', 'Lookback window in days (7-90)', (v: string) => parseInt(v, 10))
    .option('-f, --force', 'Run even if detection ran recently')
    .option('--list', 'Only list stored active patterns')
    .option('--json', 'Output as JSON')
    .action(async (options: PatternsOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await withSession(globals, async ({ runtime, orchestrator }) => {
        const patterns = options.list
          ? await runtime.store.listPatterns({ activeOnly: true })
          : await orchestrator.detectPatterns({ days: options.days, force: options.force });
        if (options.json) printJson(patterns);
        else printPatterns(patterns);
      });
    });

  return cmd;
}
