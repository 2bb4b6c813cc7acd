/**
 * Console output shared by the commands
 */

import chalk from 'chalk';
import { PRESETS, listServices, type ServiceCatalog } from './catalog';

export function renderBanner(): void {
  console.log(chalk.blue.bold('\n  n8n Raspberry Pi Setup'));
  console.log(chalk.gray('  A modular setup for deploying n8n with optional services.\n'));
}

export function renderServicesTable(catalog: ServiceCatalog): void {
  console.log(chalk.magenta.bold('  Available Services\n'));
  console.log(chalk.gray('  ') + chalk.gray('SERVICE'.padEnd(14)) + chalk.gray('DESCRIPTION'));
  console.log(chalk.gray('  ' + '-'.repeat(66)));

  for (const service of listServices(catalog)) {
    console.log('  ' + chalk.cyan(service.id.padEnd(14)) + chalk.green(service.description));
  }
  console.log('');
}

export function renderPresets(): void {
  console.log(chalk.magenta.bold('  Presets\n'));
  for (const preset of PRESETS) {
    console.log('  ' + chalk.cyan(preset.id.padEnd(14)) + chalk.white(preset.label));
    console.log('  ' + ' '.repeat(14) + chalk.gray(preset.description));
  }
  console.log('');
}
