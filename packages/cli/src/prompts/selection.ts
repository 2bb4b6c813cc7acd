/**
 * Service selection prompt
 */

import chalk from 'chalk';
import inquirer from 'inquirer';
import {
  listServices,
  orderSelection,
  validateSelection,
  type SelectionSet,
  type ServiceCatalog,
} from '../catalog';
import { InteractionUnavailableError } from '../errors';
import type { CommandLogger } from '../logger';
import { isInteractive } from '../terminal';

export interface ServiceChoice {
  name: string;
  value: string;
  checked: boolean;
}

export type CheckboxPrompt = (choices: ServiceChoice[]) => Promise<string[]>;

export interface SelectServicesOptions {
  /** Selection given on the command line; skips the prompt when present */
  supplied?: Iterable<string>;
  /** Preselected ids, also the fallback when no terminal is attached */
  defaults: SelectionSet;
  interactive?: boolean;
  prompt?: CheckboxPrompt;
  logger?: CommandLogger;
}

export const inquirerCheckbox: CheckboxPrompt = async (choices) => {
  const { services } = await inquirer.prompt<{ services: string[] }>([
    {
      type: 'checkbox',
      name: 'services',
      message: 'Choose services (use spacebar to select, enter to confirm)',
      choices,
    },
  ]);
  return services;
};

export function buildChoices(catalog: ServiceCatalog, defaults: SelectionSet): ServiceChoice[] {
  return listServices(catalog).map((service) => ({
    name: `${service.id.padEnd(12)} ${chalk.gray(service.description)}`,
    value: service.id,
    checked: defaults.has(service.id),
  }));
}

function formatIds(catalog: ServiceCatalog, selection: SelectionSet): string {
  const ids = orderSelection(catalog, selection);
  return ids.length > 0 ? ids.join(', ') : 'none';
}

export async function selectServices(
  catalog: ServiceCatalog,
  options: SelectServicesOptions
): Promise<SelectionSet> {
  if (options.supplied !== undefined) {
    return validateSelection(catalog, options.supplied);
  }

  const defaults = validateSelection(catalog, options.defaults);
  const interactive = options.interactive ?? isInteractive();

  if (!interactive) {
    const unavailable = new InteractionUnavailableError('no interactive terminal attached');
    console.log(chalk.yellow(`  Interactive selection not available: ${unavailable.message}`));
    console.log(chalk.blue(`  Using default services: ${formatIds(catalog, defaults)}\n`));
    options.logger?.warn('Falling back to default selection', {
      reason: unavailable.message,
      services: [...defaults],
    });
    return defaults;
  }

  console.log(chalk.yellow.bold('\n  Select the services you want to install:\n'));

  const prompt = options.prompt ?? inquirerCheckbox;
  const answer = await prompt(buildChoices(catalog, defaults));
  return validateSelection(catalog, answer);
}
