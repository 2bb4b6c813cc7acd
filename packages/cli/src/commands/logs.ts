/**
 * n8n-setup logs
 *
 * Print service logs from docker compose, optionally following them until
 * interrupted.
 */

import { Command } from 'commander';
import { reportError } from '../errors';
import { createCommandLogger } from '../logger';
import { createComposeBridge } from '../services/compose.service';
import { loadCommandContext, type CommandDeps } from './context';

export function createLogsCommand(deps: CommandDeps = {}): Command {
  return new Command('logs')
    .description('Show logs for services')
    .argument('[service]', 'Service name to show logs for')
    .option('-f, --follow', 'Follow log output', false)
    .action(async (service: string | undefined, options: { follow: boolean }, command: Command) => {
      const controller = new AbortController();
      const interrupt = (): void => controller.abort();
      process.once('SIGINT', interrupt);

      try {
        const { config } = await loadCommandContext(command);
        const bridge = createComposeBridge({
          command: config.backend.command,
          args: config.backend.args,
          spawn: deps.spawn,
          logger: createCommandLogger('logs'),
        });

        for await (const line of bridge.streamLogs({ service, follow: options.follow, signal: controller.signal })) {
          console.log(line);
        }
      } catch (error) {
        process.exitCode = reportError(error, 'logs', {
          BACKEND_MISSING: 'Docker not found.',
          BACKEND_INVOCATION_ERROR: `Could not show logs for ${service ?? 'services'}`,
        });
      } finally {
        process.removeListener('SIGINT', interrupt);
      }
    });
}
