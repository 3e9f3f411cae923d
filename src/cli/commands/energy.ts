/**
 * `vitalsense energy [date]`: energy prediction, and accuracy of past ones
 */

import { Command } from 'commander';
import { today } from '../../utils/dates.js';
import { printJson, withSession, type GlobalOptions } from '../bootstrap.js';
import { printComparison, printPrediction } from '../format.js';

interface EnergyOptions {
  compare?: boolean;
  days: number;
  json?: boolean;
}

export function createEnergyCommand(): Command {
  const cmd = new Command('energy');

  cmd
    .description('Predict energy for a day')
    .argument('[date]', 'Day to predict, YYYY-MM-DD (default: today)')
    .option('--compare', 'Score past regression and model predictions instead')
    .option('--days <n>', 'Comparison window in days', (v: string) => parseInt(v, 10), 30)
    .option('--json', 'Output as JSON')
    .action(async (date: string | undefined, options: EnergyOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await withSession(globals, async ({ orchestrator }) => {
        if (options.compare) {
          const comparison = await orchestrator.compareEnergyPredictions(options.days);
          if (options.json) printJson(comparison);
          else printComparison(comparison);
          return;
        }

        const prediction = await orchestrator.predictEnergy(date ?? today());
        if (options.json) printJson(prediction);
        else printPrediction(prediction);
      });
    });

  return cmd;
}
