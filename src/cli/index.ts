/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { ConfigurationError } from '../core/errors.js';
import { createBriefCommand } from './commands/brief.js';
import { createReviewCommand } from './commands/review.js';
import { createEnergyCommand } from './commands/energy.js';
import { createPatternsCommand } from './commands/patterns.js';
import { createFeedbackCommand } from './commands/feedback.js';
import { createCostsCommand } from './commands/costs.js';
import { createHealthCommand } from './commands/health.js';
import { createIngestCommand } from './commands/ingest.js';
import { createCycleCommand } from './commands/cycle.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Daily health insights from your sleep, readiness and energy data')
    .option('-d, --dir <directory>', 'Project directory (for .vitalsense.yaml)', '.')
    .option('-v, --verbose', 'Pretty-print logs to the terminal')
    .option('--db <path>', 'SQLite database path')
    .option('--provider <provider>', 'Override the default provider (anthropic, openai)')
    .option('--model <model>', 'Override the default model');

  program.addCommand(createBriefCommand());
  program.addCommand(createReviewCommand());
  program.addCommand(createEnergyCommand());
  program.addCommand(createPatternsCommand());
  program.addCommand(createFeedbackCommand());
  program.addCommand(createCostsCommand());
  program.addCommand(createHealthCommand());
  program.addCommand(createIngestCommand());
  program.addCommand(createCycleCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      const prefix = error instanceof ConfigurationError ? 'Configuration error' : 'Error';
      console.error(`\n${prefix}: ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  }
}
