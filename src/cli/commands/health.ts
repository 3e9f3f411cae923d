/**
 * `vitalsense health`: check credentials and pricing for the configured model
 */

import { Command } from 'commander';
import { VERSION } from '../../version.js';
import { printJson, withSession, type GlobalOptions } from '../bootstrap.js';

export function createHealthCommand(): Command {
  const cmd = new Command('health');

  cmd
    .description('Verify provider credentials and model pricing')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await withSession(globals, async ({ runtime }) => {
        const health = await runtime.gateway.healthCheck();
        if (options.json) {
          printJson({ version: VERSION, ...health });
          return;
        }
        console.log();
        console.log(`  Vitalsense v${VERSION}`);
        console.log('  ' + '─'.repeat(40));
        console.log(`  Provider: ${health.provider}`);
        console.log(`  Model:    ${health.model}`);
        console.log('  Status:   OK');
        console.log();
      });
    });

  return cmd;
}
