/**
 * n8n-setup setup
 *
 * Choose optional services, confirm, and run the setup steps.
 */

import { Command } from 'commander';
import { resolvePreset } from '../catalog';
import { renderBanner } from '../display';
import { ConfigurationError, reportError } from '../errors';
import { createCommandLogger } from '../logger';
import { createComposeBridge } from '../services/compose.service';
import { createComposeDeploymentBackend, runSetupWorkflow } from '../services/setup.service';
import { loadCommandContext, type CommandDeps } from './context';

interface SetupCommandOptions {
  debug: boolean;
  service: string[];
  preset?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createSetupCommand(deps: CommandDeps = {}): Command {
  return new Command('setup')
    .description('Run the interactive n8n setup')
    .option('--debug', "Run in debug mode (don't start services)", false)
    .option('--service <id>', 'Pre-select a service, may be repeated', collect, [])
    .option('--preset <id>', 'Pre-select the services of a preset')
    .action(async (options: SetupCommandOptions, command: Command) => {
      const logger = createCommandLogger('setup');
      logger.info('Starting setup', { ...options });

      renderBanner();

      try {
        const { catalog, config } = await loadCommandContext(command);

        if (options.preset && options.service.length > 0) {
          throw new ConfigurationError('Use either --service or --preset, not both');
        }

        const supplied = options.preset
          ? resolvePreset(catalog, options.preset)
          : options.service.length > 0
            ? options.service
            : undefined;

        const bridge = createComposeBridge({
          command: config.backend.command,
          args: config.backend.args,
          spawn: deps.spawn,
          logger: createCommandLogger('backend'),
        });

        const outcome = await runSetupWorkflow(
          { supplied, debugMode: options.debug },
          {
            catalog,
            config,
            backend: createComposeDeploymentBackend(bridge),
            interactive: deps.interactive,
            logger,
          }
        );
        logger.info(`Setup finished: ${outcome.state}`);
      } catch (error) {
        process.exitCode = reportError(error, 'setup', {
          BACKEND_MISSING: 'Docker not found. Please install Docker first.',
        });
      }
    });
}
