/**
 * n8n-setup services
 *
 * List the optional services and presets.
 */

import { Command } from 'commander';
import { createCatalog } from '../catalog';
import { renderPresets, renderServicesTable } from '../display';

export function createServicesCommand(): Command {
  return new Command('services')
    .description('List optional services and presets')
    .action(() => {
      console.log('');
      renderServicesTable(createCatalog());
      renderPresets();
    });
}
