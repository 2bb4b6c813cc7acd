/**
 * @n8n-pi/cli
 *
 * Program definition for the n8n-setup commands.
 */

import { Command } from 'commander';
import {
  createLogsCommand,
  createServicesCommand,
  createSetupCommand,
  createStatusCommand,
  type CommandDeps,
} from './commands';

export function createProgram(deps: CommandDeps = {}): Command {
  const program = new Command();

  program
    .name('n8n-setup')
    .description('Set up n8n with optional services on a Raspberry Pi')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to config file (default: .n8n-setup/config.json)');

  program.addCommand(createSetupCommand(deps));
  program.addCommand(createStatusCommand(deps));
  program.addCommand(createLogsCommand(deps));
  program.addCommand(createServicesCommand());

  return program;
}
