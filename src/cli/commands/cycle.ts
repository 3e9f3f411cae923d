/**
 * `vitalsense cycle [date]`: everything due for a day in one batch
 */

import { Command } from 'commander';
import { today } from '../../utils/dates.js';
import { printJson, withSession, type GlobalOptions } from '../bootstrap.js';
import { printInsight, printPrediction } from '../format.js';

export function createCycleCommand(): Command {
  const cmd = new Command('cycle');

  cmd
    .description('Run the daily cycle: brief, energy prediction and, on review day, the weekly review')
    .argument('[date]', 'Day to run, YYYY-MM-DD (default: today)')
    .option('--json', 'Output as JSON')
    .action(async (date: string | undefined, options: { json?: boolean }, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await withSession(globals, async ({ orchestrator }) => {
        const result = await orchestrator.runDailyCycle(date ?? today());
        if (options.json) {
          printJson(result);
          return;
        }
        if (result.brief) printInsight(result.brief);
        if (result.prediction) printPrediction(result.prediction);
        if (result.review) printInsight(result.review);
        for (const failure of result.failures) {
          console.error(`  ${failure.type} failed: ${failure.error}`);
        }
        if (result.failures.length > 0) process.exitCode = 1;
      });
    });

  return cmd;
}
