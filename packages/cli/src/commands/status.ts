/**
 * n8n-setup status
 *
 * Show the services docker compose reports as running.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { reportError } from '../errors';
import { createCommandLogger } from '../logger';
import { createComposeBridge } from '../services/compose.service';
import { loadCommandContext, type CommandDeps } from './context';

export function createStatusCommand(deps: CommandDeps = {}): Command {
  return new Command('status')
    .description('Show status of running services')
    .action(async (_options: Record<string, never>, command: Command) => {
      console.log(chalk.blue.bold('\n  Checking service status...\n'));

      try {
        const { config } = await loadCommandContext(command);
        const bridge = createComposeBridge({
          command: config.backend.command,
          args: config.backend.args,
          spawn: deps.spawn,
          logger: createCommandLogger('status'),
        });

        const report = await bridge.getStatusReport();

        if (report.services.length === 0) {
          console.log(chalk.yellow('  No services are currently running.\n'));
          return;
        }

        console.log(chalk.green.bold('  Running services:\n'));
        console.log(report.output.trimEnd());
        console.log('');
      } catch (error) {
        process.exitCode = reportError(error, 'status', {
          BACKEND_MISSING: 'Docker not found. Please install Docker first.',
          BACKEND_INVOCATION_ERROR: 'Could not check service status. Is Docker running?',
        });
      }
    });
}
