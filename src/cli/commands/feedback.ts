/**
 * `vitalsense feedback <insightId> <type>`: rate an insight
 */

import { Command, InvalidArgumentError } from 'commander';
import { FEEDBACK_TYPES, type FeedbackType } from '../../personalization/types.js';
import { printJson, withSession, type GlobalOptions } from '../bootstrap.js';

function parseFeedbackType(value: string): FeedbackType {
  const match = FEEDBACK_TYPES.find(type => type === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${FEEDBACK_TYPES.join(', ')}`);
  }
  return match;
}

export function createFeedbackCommand(): Command {
  const cmd = new Command('feedback');

  cmd
    .description('Record feedback on an insight')
    .argument('<insightId>', 'Insight id')
    .argument('<type>', `One of: ${FEEDBACK_TYPES.join(', ')}`, parseFeedbackType)
    .option('--json', 'Output as JSON')
    .action(async (insightId: string, type: FeedbackType, options: { json?: boolean }, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await withSession(globals, async ({ orchestrator }) => {
        const event = await orchestrator.recordFeedback(insightId, type);
        if (options.json) printJson(event);
        else console.log(`  Recorded ${event.feedbackType} for ${event.insightId}`);
      });
    });

  return cmd;
}
