/**
 * `vitalsense review [weekEnding]`: weekly review
 */

import { Command } from 'commander';
import { today } from '../../utils/dates.js';
import { printJson, withSession, type GlobalOptions } from '../bootstrap.js';
import { printInsight } from '../format.js';

interface ReviewOptions {
  force?: boolean;
  json?: boolean;
}

export function createReviewCommand(): Command {
  const cmd = new Command('review');

  cmd
    .description('Generate (or show) the review of the week ending on a day')
    .argument('[weekEnding]', 'Last day of the week, YYYY-MM-DD (default: today)')
    .option('-f, --force', 'Regenerate even if a review exists')
    .option('--json', 'Output as JSON')
    .action(async (weekEnding: string | undefined, options: ReviewOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await withSession(globals, async ({ orchestrator }) => {
        const insight = await orchestrator.generateWeeklyReview(weekEnding ?? today(), { force: options.force });
        if (options.json) printJson(insight);
        else printInsight(insight);
      });
    });

  return cmd;
}
