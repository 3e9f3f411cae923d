/**
 * `vitalsense brief [date]`: morning brief for a day
 */

import { Command } from 'commander';
import { today } from '../../utils/dates.js';
import { printJson, withSession, type GlobalOptions } from '../bootstrap.js';
import { printInsight } from '../format.js';

interface BriefOptions {
  force?: boolean;
  json?: boolean;
}

export function createBriefCommand(): Command {
  const cmd = new Command('brief');

  cmd
    .description('Generate (or show) the daily brief')
    .argument('[date]', 'Day to brief, YYYY-MM-DD (default: today)')
    .option('-f, --force', 'Regenerate even if a brief exists')
    .option('--json', 'Output as JSON')
    .action(async (date: string | undefined, options: BriefOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await withSession(globals, async ({ orchestrator }) => {
        const insight = await orchestrator.generateDailyBrief(date ?? today(), { force: options.force });
        if (options.json) printJson(insight);
        else printInsight(insight);
      });
    });

  return cmd;
}
