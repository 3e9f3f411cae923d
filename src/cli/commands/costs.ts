/**
 * `vitalsense costs`: token usage and spend
 */

import { Command } from 'commander';
import { printJson, withSession, type GlobalOptions } from '../bootstrap.js';
import { printUsageReport } from '../format.js';

interface CostsOptions {
  days: number;
  json?: boolean;
}

export function createCostsCommand(): Command {
  const cmd = new Command('costs');

  cmd
    .description('Show LLM usage and cost')
    .option('--days <n>', 'Report window in days', (v: string) => parseInt(v, 10), 30)
    .option('--json', 'Output as JSON')
    .action(async (options: CostsOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await withSession(globals, async ({ runtime }) => {
        const report = await runtime.tracker.report(options.days);
        if (options.json) printJson(report);
        else printUsageReport(report);
      });
    });

  return cmd;
}
